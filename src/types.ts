// src/types.ts — Shared types for the architecture recovery engine
// Everything that crosses a module boundary lives here: the graph model,
// detections, the semantic index, config and the error classes.

// ─── Top-level output ────────────────────────────────────────────────────────

export interface StructuredAnalysis {
  meta: AnalysisMeta;
  projects: ProjectAnalysis[];
  comparison?: PatternComparison;
  warnings: Warning[];
}

export interface AnalysisMeta {
  engineVersion: string;
  analyzedAt: string;
  catalogVersion: string;
  config: PublicConfig; // apiKey redacted
  timingMs: number;
}

export type PublicConfig = Omit<ResolvedConfig, "llm"> & {
  llm: Omit<ResolvedConfig["llm"], "apiKey">;
};

export interface ResolvedConfig {
  projects: string[];
  exclude: string[];
  includeTests: boolean;
  catalog?: string;
  output: {
    format: OutputFormat;
    dir: string;
  };
  llm: {
    provider: "anthropic";
    model: string;
    apiKey?: string;
    baseUrl?: string;
    maxOutputTokens: number;
    refine: boolean;
  };
  verbose: boolean;
}

export type OutputFormat = "json" | "markdown";

// ─── Warnings (shared sink passed to every module) ──────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Graph model ─────────────────────────────────────────────────────────────

export const ENTITY_KINDS = [
  "struct",
  "enum",
  "trait",
  "fn",
  "mod",
  "impl",
  "type",
  "const",
  "static",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export const VISIBILITIES = [
  "pub",
  "pub(crate)",
  "pub(super)",
  "pub(self)",
  "pub(in ...)",
  "private",
] as const;

export type Visibility = (typeof VISIBILITIES)[number];

export interface Entity {
  name: string;
  kind: EntityKind;
  visibility: Visibility;
  /** Relative path of the file the declaration was found in. */
  module: string;
  /** 1-based. */
  line: number;
  doc?: string;
}

export type RelationshipKind =
  | "implements"
  | "derives"
  | "contains"
  | "uses"
  | "references";

export interface Edge {
  from: string;
  to: string;
  relationship: RelationshipKind;
  source: string;
}

export interface Cluster {
  name: string;
  /** Sorted, unique entity names. */
  entityIds: string[];
}

export interface KnowledgeGraph {
  project: string;
  nodes: Entity[];
  edges: Edge[];
  clusters: Cluster[];
  stats: {
    totalNodes: number;
    totalEdges: number;
    totalClusters: number;
    totalCandidates: number;
  };
}

// ─── Signatures and detections ──────────────────────────────────────────────

export type EvidenceKind = "keyword" | "import" | "pattern" | "trait";

/** One piece of evidence a signature looks for. Weight comes from the kind. */
export type EvidenceSpec =
  | { kind: "keyword"; value: string }
  | { kind: "import"; value: string }
  | { kind: "pattern"; value: string; regex: RegExp }
  | { kind: "trait"; value: string };

export interface Signature {
  name: string;
  description?: string;
  /** Situations the pattern suits, listed in the pattern library. */
  usage?: string[];
  /** Names of related catalogue patterns. */
  related?: string[];
  evidence: EvidenceSpec[];
}

export type WorkspaceHeuristic = "multi-package-workspace" | "modular-monolith";

export interface StyleSignature extends Signature {
  /** Styles with a heuristic skip the generic scorer. */
  heuristic?: WorkspaceHeuristic;
}

export interface CommunicationSignature {
  name: string;
  signals: string[];
}

export interface SignatureCatalog {
  version: string;
  designPatterns: Signature[];
  architectureStyles: StyleSignature[];
  communicationPatterns: CommunicationSignature[];
}

export interface Detection {
  name: string;
  confidence: number;
  evidence: string[];
  description?: string;
  /** Set when an external validator replaced the computed confidence. */
  originalConfidence?: number;
}

export interface CommunicationPattern {
  name: string;
  evidence: string[];
  usageCount: number;
}

// ─── Manifest ────────────────────────────────────────────────────────────────

export interface ManifestPackage {
  name: string;
  path: string;
  version?: string;
  description?: string;
  dependencies: string[];
}

export interface ManifestInfo {
  found: boolean;
  /** Root manifest followed by member manifests. Used as import evidence. */
  text: string;
  name?: string;
  version?: string;
  isWorkspace: boolean;
  packageCount: number;
  packages: ManifestPackage[];
}

// ─── Semantic index ──────────────────────────────────────────────────────────

export interface HotSpot {
  name: string;
  degree: number;
}

export interface EntryPoint {
  file: string;
  type: "main" | "lib" | "main_function";
  description: string;
}

export interface PublicApiEntry {
  name: string;
  kind: EntityKind;
  module: string;
}

export interface SemanticIndex {
  fileToConcepts: Record<string, string[]>;
  conceptToFiles: Record<string, string[]>;
  hotSpots: HotSpot[];
  entryPoints: EntryPoint[];
  publicApis: PublicApiEntry[];
  stats: {
    totalFiles: number;
    totalConcepts: number;
    totalPublicApis: number;
    totalHotSpots: number;
    totalEntryPoints: number;
  };
}

// ─── Supplementary analyses ──────────────────────────────────────────────────

export interface LineMetrics {
  files: number;
  lines: number;
  code: number;
  comments: number;
  blanks: number;
}

export interface ApiSurface {
  items: PublicApiEntry[];
  byKind: Record<string, string[]>;
  byVisibility: Record<string, string[]>;
  byModule: Record<string, string[]>;
  stats: {
    totalItems: number;
    structs: number;
    enums: number;
    traits: number;
    functions: number;
    modules: number;
  };
}

// ─── Per-project analysis ────────────────────────────────────────────────────

export interface PatternLibraryEntry {
  name: string;
  confidence: number;
  evidence: string[];
  description: string;
  whenToUse: string[];
  relatedPatterns: string[];
}

export interface ProjectAnalysis {
  name: string;
  rootDir: string;
  manifest: Omit<ManifestInfo, "text">;
  files: string[];
  metrics: LineMetrics;
  graph: KnowledgeGraph;
  architectureStyles: Detection[];
  designPatterns: Detection[];
  communicationPatterns: CommunicationPattern[];
  /** Detected design patterns with catalogue guidance, most confident first. */
  patternLibrary: PatternLibraryEntry[];
  semanticIndex: SemanticIndex;
  apiSurface: ApiSurface;
}

export interface ProjectComparison {
  styles: string[];
  styleDetails: Detection[];
  designPatterns: string[];
  patternDetails: Detection[];
  communication: string[];
  packageCount: number;
}

export interface PatternComparison {
  projects: Record<string, ProjectComparison>;
  allStyles: string[];
  allPatterns: string[];
  allCommunication: string[];
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    if (cause) this.cause = cause;
  }
}

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly catalogPath?: string,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "LLMError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.3.0";

/** Directories never descended into while scanning. */
export const DEFAULT_EXCLUDE_DIRS = [
  "target",
  ".git",
  "node_modules",
  ".cargo",
] as const;

/** Path substrings that mark test, bench and example code. */
export const TEST_PATH_MARKERS = [
  "/tests/",
  "/test/",
  "/benches/",
  "/bench/",
  "/examples/",
  "/example/",
  "/fuzz/",
  "/stress/",
  "_test.rs",
  "_tests.rs",
  "_bench.rs",
] as const;

export const SOURCE_EXTENSION = /\.rs$/;

export const FIELD_USAGE_NODE = "field_usage";

export const MAX_HOT_SPOTS = 20;

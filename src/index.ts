// src/index.ts — Library API
// Two entry points: analyze() and format()

import { resolve } from "node:path";
import type { OutputFormat, ResolvedConfig, StructuredAnalysis } from "./types.js";
import { runPipeline } from "./pipeline.js";
import { defaultConfig } from "./config.js";
import { formatArchitectureMd } from "./report-formatter.js";

// Re-export all public types
export type {
  StructuredAnalysis,
  AnalysisMeta,
  ProjectAnalysis,
  Entity,
  EntityKind,
  Visibility,
  Edge,
  RelationshipKind,
  Cluster,
  KnowledgeGraph,
  EvidenceKind,
  EvidenceSpec,
  Signature,
  StyleSignature,
  CommunicationSignature,
  SignatureCatalog,
  Detection,
  CommunicationPattern,
  ManifestInfo,
  ManifestPackage,
  SemanticIndex,
  HotSpot,
  EntryPoint,
  PublicApiEntry,
  LineMetrics,
  ApiSurface,
  PatternComparison,
  PatternLibraryEntry,
  ProjectComparison,
  Warning,
  ResolvedConfig,
  PublicConfig,
  OutputFormat,
} from "./types.js";

export {
  ENGINE_VERSION,
  InvalidArgumentError,
  FileNotFoundError,
  CatalogError,
  LLMError,
} from "./types.js";

export { extractEntities, parseVisibility } from "./entity-extractor.js";
export { extractRelationships } from "./relationship-extractor.js";
export { detectSignatures, scoreSignature, EVIDENCE_WEIGHTS } from "./pattern-detector.js";
export { detectArchitectureStyles, detectCommunicationPatterns } from "./architecture-detector.js";
export { assignClusters, classifyLayer } from "./cluster-assigner.js";
export { buildSemanticIndex } from "./semantic-indexer.js";
export { scanSourceFiles, loadSourceFiles } from "./source-scanner.js";
export { readManifest } from "./manifest-reader.js";
export { loadSignatureCatalog, parseSignatureCatalog } from "./signature-catalog.js";
export { buildKnowledgeGraph } from "./knowledge-graph.js";
export { countLines } from "./line-metrics.js";
export { summarizeApiSurface } from "./api-surface.js";
export { compareProjects, formatComparisonMatrix } from "./pattern-comparison.js";
export { generateClusterDiagram, generateCrateDiagram } from "./mermaid-generator.js";
export { buildPatternLibrary, formatPatternLibrary } from "./pattern-library.js";
export { formatArchitectureMd } from "./report-formatter.js";
export { analyzeProject } from "./pipeline.js";

export type AnalyzeOptions = Partial<Omit<ResolvedConfig, "output" | "llm">> & {
  projects: string[];
  output?: Partial<ResolvedConfig["output"]>;
  llm?: Partial<ResolvedConfig["llm"]>;
};

/**
 * Analyze one or more Rust projects and produce a StructuredAnalysis.
 * Pure computation + file reads, unless `llm.refine` is set with a key.
 */
export async function analyze(options: AnalyzeOptions): Promise<StructuredAnalysis> {
  const defaults = defaultConfig();
  const config: ResolvedConfig = {
    ...defaults,
    ...options,
    projects: options.projects.map((p) => resolve(p)),
    output: { ...defaults.output, ...options.output },
    llm: { ...defaults.llm, ...options.llm, provider: "anthropic" },
  };
  return runPipeline(config);
}

/**
 * Render a StructuredAnalysis. No LLM call is made for either format.
 */
export function format(analysis: StructuredAnalysis, outputFormat: OutputFormat): string {
  return outputFormat === "json"
    ? JSON.stringify(analysis, null, 2) + "\n"
    : formatArchitectureMd(analysis);
}

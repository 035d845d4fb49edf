// src/signature-catalog.ts — Signature catalogue loading and validation
// The catalogue is versioned data: a JSON file passed into the detectors,
// never module-level state. Entries are validated field by field so that a
// partial signature only loses the categories it got wrong.

import { readFileSync } from "node:fs";
import type {
  CommunicationSignature,
  EvidenceSpec,
  Signature,
  SignatureCatalog,
  StyleSignature,
  Warning,
  WorkspaceHeuristic,
} from "./types.js";
import { CatalogError } from "./types.js";

export const DEFAULT_CATALOG_URL = new URL("../catalog/default-catalog.json", import.meta.url);

const HEURISTICS: readonly WorkspaceHeuristic[] = ["multi-package-workspace", "modular-monolith"];

/** Signature as written in catalogue files: four optional evidence lists. */
export interface SignatureDefinition {
  name: string;
  description?: string;
  usage?: string[];
  related?: string[];
  keywords?: string[];
  imports?: string[];
  patterns?: string[];
  traits?: string[];
}

/**
 * Load and validate a catalogue. Without a path the bundled default is used.
 * Throws CatalogError when the file cannot be read or is not a JSON object.
 */
export function loadSignatureCatalog(
  catalogPath?: string,
  warnings: Warning[] = [],
): SignatureCatalog {
  const location = catalogPath ?? DEFAULT_CATALOG_URL;
  const label = typeof location === "string" ? location : location.pathname;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(location, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Cannot load signature catalog: ${msg}`, label);
  }
  return parseSignatureCatalog(raw, warnings);
}

export function parseSignatureCatalog(
  raw: unknown,
  warnings: Warning[] = [],
): SignatureCatalog {
  if (!isRecord(raw)) {
    throw new CatalogError("Signature catalog must be a JSON object");
  }

  const designPatterns = asArray(raw.designPatterns)
    .map((entry) => toSignature(entry, warnings))
    .filter((s): s is Signature => s !== undefined);

  const architectureStyles = asArray(raw.architectureStyles)
    .map((entry) => toStyleSignature(entry, warnings))
    .filter((s): s is StyleSignature => s !== undefined);

  const communicationPatterns = asArray(raw.communicationPatterns)
    .map(toCommunicationSignature)
    .filter((s): s is CommunicationSignature => s !== undefined);

  return {
    version: typeof raw.version === "string" ? raw.version : "unversioned",
    designPatterns,
    architectureStyles,
    communicationPatterns,
  };
}

/**
 * Turn the four-list catalogue form into a tagged evidence list.
 * Missing or non-string entries are dropped; uncompilable regexes are
 * dropped with a warning.
 */
export function compileSignature(
  definition: SignatureDefinition,
  warnings: Warning[] = [],
): Signature {
  const evidence: EvidenceSpec[] = [];

  for (const value of definition.keywords ?? []) {
    evidence.push({ kind: "keyword", value });
  }
  for (const value of definition.imports ?? []) {
    evidence.push({ kind: "import", value });
  }
  for (const value of definition.patterns ?? []) {
    try {
      evidence.push({ kind: "pattern", value, regex: new RegExp(value) });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "warn",
        module: "signature-catalog",
        message: `Signature "${definition.name}": invalid pattern ${JSON.stringify(value)} ignored (${msg})`,
      });
    }
  }
  for (const value of definition.traits ?? []) {
    evidence.push({ kind: "trait", value });
  }

  const signature: Signature = { name: definition.name, evidence };
  if (definition.description) signature.description = definition.description;
  if (definition.usage && definition.usage.length > 0) signature.usage = definition.usage;
  if (definition.related && definition.related.length > 0) signature.related = definition.related;
  return signature;
}

function toSignature(entry: unknown, warnings: Warning[]): Signature | undefined {
  if (!isRecord(entry) || typeof entry.name !== "string" || !entry.name) {
    warnings.push({
      level: "warn",
      module: "signature-catalog",
      message: "Catalog entry without a name ignored",
    });
    return undefined;
  }
  return compileSignature(
    {
      name: entry.name,
      description: typeof entry.description === "string" ? entry.description : undefined,
      usage: stringList(entry.usage),
      related: stringList(entry.related),
      keywords: stringList(entry.keywords),
      imports: stringList(entry.imports),
      patterns: stringList(entry.patterns),
      traits: stringList(entry.traits),
    },
    warnings,
  );
}

function toStyleSignature(entry: unknown, warnings: Warning[]): StyleSignature | undefined {
  const signature = toSignature(entry, warnings);
  if (!signature || !isRecord(entry)) return undefined;
  const heuristic = HEURISTICS.find((h) => h === entry.heuristic);
  return heuristic ? { ...signature, heuristic } : signature;
}

function toCommunicationSignature(entry: unknown): CommunicationSignature | undefined {
  if (!isRecord(entry) || typeof entry.name !== "string") return undefined;
  return { name: entry.name, signals: stringList(entry.signals) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function stringList(value: unknown): string[] {
  return asArray(value).filter((v): v is string => typeof v === "string" && v.length > 0);
}

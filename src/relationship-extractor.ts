// src/relationship-extractor.ts — Relationship Extractor
// Five independent single-pass scans over raw file text. Like the entity
// scanner, nothing here tracks braces, comments or string literals.

import type { Edge } from "./types.js";
import { FIELD_USAGE_NODE } from "./types.js";
import { fileStem, lastPathSegment, assertArgument } from "./text-utils.js";

const IMPL_FOR = /\bimpl(?:<[^>]*>)?\s+(?<trait>(?:\w+::)*\w+)(?:<[^>]*>)?\s+for\s+(?<type>\w+)/g;

const DERIVE =
  /#\[derive\((?<traits>[^)]+)\)\]\s*(?:#\[[^\]]*\]\s*)*(?:pub(?:\s*\([^)]*\))?\s+)?(?:struct|enum)\s+(?<type>\w+)/g;

const MOD_DECL = /\b(?:pub(?:\s*\([^)]*\))?\s+)?mod\s+(?<name>\w+)/g;

const USE_PATH = /\buse\s+(?:crate::)?(?<path>[a-zA-Z_][a-zA-Z0-9_:]*)/g;

// `name: Type`, `name: &mut Type`, `name: Option<Type>` …
const FIELD_TYPE = /(\w+)\s*:\s*(?:&)?(?:mut\s+)?(?:Option<|Vec<|Box<|Arc<|Rc<)?(?<type>\w+)/g;

/** Types that never name a project entity. */
export const PRIMITIVE_TYPES: ReadonlySet<string> = new Set([
  "str",
  "String",
  "usize",
  "isize",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "f32",
  "f64",
  "bool",
  "char",
  "Self",
]);

/**
 * Extract typed edges from one file.
 *
 * `uses` edges start at the file stem and `references` edges at the synthetic
 * `field_usage` node; neither is the true referencing symbol.
 */
export function extractRelationships(
  text: string,
  filePath: string,
  knownEntities: ReadonlySet<string>,
): Edge[] {
  assertArgument(typeof text === "string", "extractRelationships: text must be a string");
  assertArgument(
    typeof filePath === "string" && filePath.length > 0,
    "extractRelationships: filePath must be a non-empty string",
  );
  assertArgument(knownEntities instanceof Set, "extractRelationships: knownEntities must be a Set");

  const stem = fileStem(filePath);
  return [
    ...extractImplements(text, filePath),
    ...extractDerives(text, filePath),
    ...extractContains(text, filePath, stem),
    ...extractUses(text, filePath, stem, knownEntities),
    ...extractReferences(text, filePath, knownEntities),
  ];
}

function extractImplements(text: string, source: string): Edge[] {
  const edges: Edge[] = [];
  for (const match of text.matchAll(IMPL_FOR)) {
    const trait = match.groups?.trait;
    const type = match.groups?.type;
    if (!trait || !type) continue;
    edges.push({ from: type, to: lastPathSegment(trait), relationship: "implements", source });
  }
  return edges;
}

function extractDerives(text: string, source: string): Edge[] {
  const edges: Edge[] = [];
  for (const match of text.matchAll(DERIVE)) {
    const traits = match.groups?.traits;
    const type = match.groups?.type;
    if (!traits || !type) continue;
    for (const raw of traits.split(",")) {
      const trait = raw.trim();
      if (!trait) continue;
      edges.push({ from: type, to: trait, relationship: "derives", source });
    }
  }
  return edges;
}

// Nested `mod a { mod b; }` blocks are not tracked: every module hangs off the file stem.
function extractContains(text: string, source: string, stem: string): Edge[] {
  const edges: Edge[] = [];
  for (const match of text.matchAll(MOD_DECL)) {
    const name = match.groups?.name;
    if (!name) continue;
    edges.push({ from: stem, to: name, relationship: "contains", source });
  }
  return edges;
}

function extractUses(
  text: string,
  source: string,
  stem: string,
  known: ReadonlySet<string>,
): Edge[] {
  const edges: Edge[] = [];
  for (const match of text.matchAll(USE_PATH)) {
    const path = match.groups?.path;
    if (!path) continue;
    const imported = lastPathSegment(path);
    if (imported && known.has(imported)) {
      edges.push({ from: stem, to: imported, relationship: "uses", source });
    }
  }
  return edges;
}

function extractReferences(
  text: string,
  source: string,
  known: ReadonlySet<string>,
): Edge[] {
  const edges: Edge[] = [];
  for (const match of text.matchAll(FIELD_TYPE)) {
    const type = match.groups?.type;
    if (!type || PRIMITIVE_TYPES.has(type) || !known.has(type)) continue;
    edges.push({ from: FIELD_USAGE_NODE, to: type, relationship: "references", source });
  }
  return edges;
}

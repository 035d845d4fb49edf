// src/semantic-indexer.ts — Semantic Index
// Navigation hints over the entity graph: file ↔ concept maps, the most
// connected names, entry points and the public API subset.

import type {
  Edge,
  Entity,
  EntityKind,
  EntryPoint,
  HotSpot,
  PublicApiEntry,
  SemanticIndex,
} from "./types.js";
import { MAX_HOT_SPOTS } from "./types.js";
import { assertArgument } from "./text-utils.js";

const ENTRY_FILES: ReadonlyArray<{ file: string; type: EntryPoint["type"]; description: string }> = [
  { file: "src/main.rs", type: "main", description: "Binary entry point" },
  { file: "src/lib.rs", type: "lib", description: "Library entry point" },
  { file: "lib.rs", type: "lib", description: "Library entry point" },
  { file: "main.rs", type: "main", description: "Binary entry point" },
];

const PUBLIC_API_KINDS: ReadonlySet<EntityKind> = new Set(["fn", "struct", "trait"]);

/**
 * Build the semantic index for a graph.
 *
 * `files` is the list of scanned project-relative paths used to find canonical
 * entry files; when omitted the modules that declare entities stand in for it.
 */
export function buildSemanticIndex(
  entities: readonly Entity[],
  edges: readonly Edge[],
  files?: readonly string[],
): SemanticIndex {
  assertArgument(Array.isArray(entities), "buildSemanticIndex: entities must be an array");
  assertArgument(Array.isArray(edges), "buildSemanticIndex: edges must be an array");

  const fileToConcepts: Record<string, string[]> = {};
  const conceptToFiles: Record<string, string[]> = {};

  for (const entity of entities) {
    const concepts = (fileToConcepts[entity.module] ??= []);
    if (!concepts.includes(entity.name)) concepts.push(entity.name);

    const modules = (conceptToFiles[entity.name] ??= []);
    if (!modules.includes(entity.module)) modules.push(entity.module);
  }

  const hotSpots = rankHotSpots(edges, MAX_HOT_SPOTS);
  const entryPoints = detectEntryPoints(entities, files ?? entities.map((e) => e.module));
  const publicApis: PublicApiEntry[] = entities
    .filter((e) => e.visibility === "pub" && PUBLIC_API_KINDS.has(e.kind))
    .map((e) => ({ name: e.name, kind: e.kind, module: e.module }));

  return {
    fileToConcepts,
    conceptToFiles,
    hotSpots,
    entryPoints,
    publicApis,
    stats: {
      totalFiles: Object.keys(fileToConcepts).length,
      totalConcepts: Object.keys(conceptToFiles).length,
      totalPublicApis: publicApis.length,
      totalHotSpots: hotSpots.length,
      totalEntryPoints: entryPoints.length,
    },
  };
}

/**
 * Undirected degree of every edge endpoint, highest first. Equal degrees keep
 * the order in which the names first appeared.
 */
export function rankHotSpots(edges: readonly Edge[], limit: number = MAX_HOT_SPOTS): HotSpot[] {
  const degree = new Map<string, number>();
  for (const edge of edges) {
    degree.set(edge.from, (degree.get(edge.from) ?? 0) + 1);
    degree.set(edge.to, (degree.get(edge.to) ?? 0) + 1);
  }
  return [...degree.entries()]
    .map(([name, d]) => ({ name, degree: d }))
    .sort((a, b) => b.degree - a.degree)
    .slice(0, limit);
}

/**
 * Canonical entry files that exist, then the first `fn main` entity.
 * The two checks are independent, so a `src/main.rs` with `fn main` is
 * reported twice.
 */
export function detectEntryPoints(
  entities: readonly Entity[],
  files: readonly string[],
): EntryPoint[] {
  const present = new Set(files);
  const entryPoints: EntryPoint[] = ENTRY_FILES.filter((e) => present.has(e.file)).map((e) => ({
    file: e.file,
    type: e.type,
    description: e.description,
  }));

  const main = entities.find((e) => e.name === "main" && e.kind === "fn");
  if (main) {
    entryPoints.push({ file: main.module, type: "main_function", description: "main() function" });
  }
  return entryPoints;
}

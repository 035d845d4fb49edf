// src/knowledge-graph.ts — Knowledge graph assembly
// Two passes over the decoded sources: every file's candidates first, then
// relationships against the complete set of node names, so an edge does not
// depend on the order in which files were visited.

import { basename, resolve } from "node:path";
import type { Entity, Edge, KnowledgeGraph, LineMetrics, Warning } from "./types.js";
import { loadSourceFiles, type ScanOptions } from "./source-scanner.js";
import { extractEntities } from "./entity-extractor.js";
import { extractRelationships } from "./relationship-extractor.js";
import { assignClusters } from "./cluster-assigner.js";
import { aggregateLineMetrics } from "./line-metrics.js";

export interface KnowledgeGraphResult {
  graph: KnowledgeGraph;
  /** Scanned files, project-relative. */
  files: string[];
  /** All decoded source text, one file after another. */
  corpus: string;
  metrics: LineMetrics;
}

export function buildKnowledgeGraph(
  projectDir: string,
  options: ScanOptions = {},
  warnings: Warning[] = [],
): KnowledgeGraphResult {
  const absDir = resolve(projectDir);
  const sources = loadSourceFiles(absDir, options, warnings);

  const candidates: Entity[] = [];
  for (const source of sources) {
    candidates.push(...extractEntities(source.text, source.relativePath));
  }
  const nodes = collapseByName(candidates);

  const known = new Set(nodes.map((n) => n.name));
  const edges: Edge[] = [];
  for (const source of sources) {
    edges.push(...extractRelationships(source.text, source.relativePath, known));
  }

  const clusters = assignClusters(nodes);

  return {
    graph: {
      project: basename(absDir),
      nodes,
      edges,
      clusters,
      stats: {
        totalNodes: nodes.length,
        totalEdges: edges.length,
        totalClusters: clusters.length,
        totalCandidates: candidates.length,
      },
    },
    files: sources.map((s) => s.relativePath),
    corpus: sources.map((s) => s.text).join("\n"),
    metrics: aggregateLineMetrics(sources.map((s) => s.text)),
  };
}

/**
 * One node per name; the first candidate seen wins. Candidates arrive in file
 * order then line order, so this is deterministic for a given tree.
 * Same-named items in different modules are merged.
 */
export function collapseByName(candidates: readonly Entity[]): Entity[] {
  const byName = new Map<string, Entity>();
  for (const candidate of candidates) {
    if (!byName.has(candidate.name)) byName.set(candidate.name, candidate);
  }
  return [...byName.values()];
}

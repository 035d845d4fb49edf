// src/mermaid-generator.ts — Mermaid Diagram Generator
// Renders the knowledge graph as a Mermaid `graph TD`: one subgraph per
// cluster, edges only between nodes that belong to a cluster, color-coded by
// layer. Workspaces also get a crate dependency diagram from their manifests.

import type { KnowledgeGraph, ManifestPackage } from "./types.js";

export const DEFAULT_MAX_DIAGRAM_EDGES = 50;

export interface DiagramOptions {
  maxEdges?: number;
  /** Wrap in a ```mermaid fence for embedding in markdown. */
  fenced?: boolean;
}

/**
 * Generate the cluster diagram. Returns "" for an empty graph.
 */
export function generateClusterDiagram(
  graph: KnowledgeGraph,
  options: DiagramOptions = {},
): string {
  if (graph.clusters.length === 0) return "";

  const maxEdges = options.maxEdges ?? DEFAULT_MAX_DIAGRAM_EDGES;
  const lines: string[] = ["graph TD"];
  const placed = new Set<string>();

  for (const cluster of graph.clusters) {
    const clusterId = sanitizeId(`cluster_${cluster.name}`);
    lines.push(`  subgraph ${clusterId}["${escapeLabel(cluster.name)}"]`);
    for (const name of cluster.entityIds) {
      lines.push(`    ${nodeId(name)}["${escapeLabel(name)}"]`);
      placed.add(name);
    }
    lines.push("  end");
  }

  const seen = new Set<string>();
  let emitted = 0;
  for (const edge of graph.edges) {
    if (emitted >= maxEdges) break;
    if (!placed.has(edge.from) || !placed.has(edge.to) || edge.from === edge.to) continue;
    const key = `${edge.from}|${edge.relationship}|${edge.to}`;
    if (seen.has(key)) continue;
    seen.add(key);
    lines.push(`  ${nodeId(edge.from)} -->|${edge.relationship}| ${nodeId(edge.to)}`);
    emitted++;
  }

  for (const cluster of graph.clusters) {
    const color = layerColor(cluster.name);
    if (color) lines.push(`  style ${sanitizeId(`cluster_${cluster.name}`)} fill:${color}`);
  }

  const diagram = lines.join("\n");
  return options.fenced ? ["```mermaid", diagram, "```"].join("\n") : diagram;
}

/**
 * Crate dependency diagram (`graph LR`): one node per package, one edge per
 * dependency on another package of the same workspace. Cargo treats `-` and
 * `_` in crate names alike. Returns "" for fewer than two packages.
 */
export function generateCrateDiagram(
  packages: readonly ManifestPackage[],
  options: Pick<DiagramOptions, "fenced"> = {},
): string {
  if (packages.length < 2) return "";

  const members = new Map(packages.map((pkg) => [crateKey(pkg.name), pkg.name]));
  const lines: string[] = ["graph LR"];

  for (const pkg of packages) {
    lines.push(`  ${crateId(pkg.name)}["${escapeLabel(pkg.name)}"]`);
  }
  for (const pkg of packages) {
    const targets = new Set<string>();
    for (const dep of pkg.dependencies) {
      const target = members.get(crateKey(dep));
      if (target && target !== pkg.name) targets.add(target);
    }
    for (const target of [...targets].sort()) {
      lines.push(`  ${crateId(pkg.name)} --> ${crateId(target)}`);
    }
  }

  const diagram = lines.join("\n");
  return options.fenced ? ["```mermaid", diagram, "```"].join("\n") : diagram;
}

function crateKey(name: string): string {
  return name.replace(/_/g, "-");
}

function crateId(name: string): string {
  return `crate_${sanitizeId(name)}`;
}

/**
 * Sanitize a name into a valid Mermaid node ID.
 */
export function sanitizeId(name: string): string {
  return name.replace(/[^a-zA-Z0-9]/g, "_");
}

/** Entity names such as `end` or `graph` collide with Mermaid keywords. */
function nodeId(name: string): string {
  return `n_${sanitizeId(name)}`;
}

function escapeLabel(label: string): string {
  return label.replace(/"/g, "#quot;");
}

function layerColor(cluster: string): string | null {
  switch (cluster) {
    case "Domain Layer": return "#e1f5fe";
    case "Application Layer": return "#f3e5f5";
    case "Infrastructure Layer": return "#e8f5e9";
    case "Interface Layer": return "#fff3e0";
    case "Utilities": return "#f5f5f5";
    default: return null;
  }
}

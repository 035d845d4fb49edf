// src/report-formatter.ts — Markdown reports from structured analysis
// No LLM call, pure data formatting. Each section formatter returns a
// standalone markdown block; formatArchitectureMd stitches them together.

import type {
  CommunicationPattern,
  Detection,
  KnowledgeGraph,
  ProjectAnalysis,
  SemanticIndex,
  StructuredAnalysis,
} from "./types.js";
import { ENGINE_VERSION } from "./types.js";
import { formatPercent } from "./text-utils.js";
import { generateClusterDiagram, generateCrateDiagram } from "./mermaid-generator.js";
import { formatPatternLibrary } from "./pattern-library.js";
import { formatComparisonMatrix } from "./pattern-comparison.js";

const MAX_CLUSTER_MEMBERS = 10;
const MAX_GUIDE_HOT_SPOTS = 10;
const MAX_GUIDE_APIS = 15;

// ─── Main Entry ──────────────────────────────────────────────────────────────

/**
 * Full ARCHITECTURE.md: one chapter per project, then the comparison matrix
 * when several projects were analyzed.
 */
export function formatArchitectureMd(analysis: StructuredAnalysis): string {
  const sections: string[] = [
    "# Architecture Overview",
    "",
    `_Generated by archlens ${ENGINE_VERSION} on ${analysis.meta.analyzedAt.slice(0, 10)}._`,
  ];

  for (const project of analysis.projects) {
    sections.push("", formatProjectChapter(project));
  }

  if (analysis.comparison) {
    sections.push("", formatComparisonMatrix(analysis.comparison).trimEnd());
  }

  return sections.join("\n") + "\n";
}

export function formatProjectChapter(project: ProjectAnalysis): string {
  const parts = [
    `## ${project.name}`,
    "",
    formatArchitectureReport(project),
    "",
    formatKnowledgeGraphSummary(project.graph),
  ];

  const crates = generateCrateDiagram(project.manifest.packages, { fenced: true });
  if (crates) parts.push("", "### Crate Dependencies", "", crates);

  const diagram = generateClusterDiagram(project.graph, { fenced: true });
  if (diagram) parts.push("", "### Cluster Diagram", "", diagram);

  parts.push("", formatPatternLibrary(project.patternLibrary));
  parts.push("", formatSemanticIndexGuide(project.semanticIndex));
  return parts.join("\n");
}

// ─── Architecture report ─────────────────────────────────────────────────────

export function formatArchitectureReport(project: ProjectAnalysis): string {
  const lines: string[] = ["### Architecture", ""];
  const { manifest, metrics } = project;

  if (manifest.isWorkspace) {
    lines.push(`- **Type:** Multi-package workspace (${manifest.packageCount} packages)`);
    for (const pkg of manifest.packages) {
      lines.push(`  - \`${pkg.name}\` (${pkg.path})${pkg.description ? `: ${pkg.description}` : ""}`);
    }
  } else if (manifest.found) {
    const version = manifest.version ? ` ${manifest.version}` : "";
    lines.push(`- **Type:** Single package${manifest.name ? ` \`${manifest.name}\`${version}` : ""}`);
  } else {
    lines.push("- **Type:** No Cargo.toml found");
  }
  lines.push(
    `- **Source files:** ${metrics.files} (${metrics.code} code, ${metrics.comments} comment, ${metrics.blanks} blank lines)`,
  );

  lines.push("", "#### Architecture Styles", "");
  lines.push(...formatDetections(project.architectureStyles, "No architecture style detected."));

  lines.push("", "#### Communication Patterns", "");
  lines.push(...formatCommunication(project.communicationPatterns));

  lines.push("", "#### Design Patterns", "");
  lines.push(...formatDetections(project.designPatterns, "No design pattern detected."));

  return lines.join("\n");
}

function formatDetections(detections: readonly Detection[], empty: string): string[] {
  if (detections.length === 0) return [`_${empty}_`];
  const lines: string[] = [];
  for (const d of detections) {
    const refined =
      d.originalConfidence !== undefined ? ` (heuristic ${formatPercent(d.originalConfidence)})` : "";
    lines.push(`- **${d.name}** (${formatPercent(d.confidence)}${refined})`);
    if (d.description) lines.push(`  - ${d.description}`);
    if (d.evidence.length > 0) lines.push(`  - Evidence: ${d.evidence.join(", ")}`);
  }
  return lines;
}

function formatCommunication(patterns: readonly CommunicationPattern[]): string[] {
  if (patterns.length === 0) return ["_No communication primitives found._"];
  return patterns.map(
    (p) => `- **${p.name}**: ${p.usageCount} uses (${p.evidence.map((e) => `\`${e}\``).join(", ")})`,
  );
}

// ─── Knowledge graph summary ─────────────────────────────────────────────────

export function formatKnowledgeGraphSummary(graph: KnowledgeGraph): string {
  const lines: string[] = [
    "### Knowledge Graph",
    "",
    `- **Entities:** ${graph.stats.totalNodes} (${graph.stats.totalCandidates} declarations)`,
    `- **Relationships:** ${graph.stats.totalEdges}`,
    `- **Clusters:** ${graph.stats.totalClusters}`,
  ];

  const kinds = tally(graph.nodes.map((n) => n.kind));
  if (kinds.length > 0) {
    lines.push("", "#### Entity Kinds", "", "| Kind | Count |", "|---|---|");
    for (const [kind, count] of kinds) lines.push(`| ${kind} | ${count} |`);
  }

  if (graph.clusters.length > 0) {
    lines.push("", "#### Clusters", "");
    for (const cluster of graph.clusters) {
      const shown = cluster.entityIds.slice(0, MAX_CLUSTER_MEMBERS).map((id) => `\`${id}\``);
      const more = cluster.entityIds.length - shown.length;
      lines.push(
        `- **${cluster.name}** (${cluster.entityIds.length}): ${shown.join(", ")}${more > 0 ? `, +${more} more` : ""}`,
      );
    }
  }

  const relationships = tally(graph.edges.map((e) => e.relationship));
  if (relationships.length > 0) {
    lines.push("", "#### Relationships", "", "| Relationship | Count |", "|---|---|");
    for (const [relationship, count] of relationships) lines.push(`| ${relationship} | ${count} |`);
  }

  return lines.join("\n");
}

// ─── Semantic index guide ────────────────────────────────────────────────────

export function formatSemanticIndexGuide(index: SemanticIndex): string {
  const lines: string[] = ["### Navigation Guide", ""];

  lines.push("#### Entry Points", "");
  if (index.entryPoints.length === 0) lines.push("_None found._");
  for (const entry of index.entryPoints) {
    lines.push(`- \`${entry.file}\`: ${entry.description}`);
  }

  lines.push("", "#### Hot Spots", "");
  const hot = index.hotSpots.slice(0, MAX_GUIDE_HOT_SPOTS);
  if (hot.length === 0) lines.push("_None found._");
  else {
    lines.push("| Concept | Connections |", "|---|---|");
    for (const spot of hot) lines.push(`| \`${spot.name}\` | ${spot.degree} |`);
  }

  lines.push("", "#### Public API", "");
  const apis = index.publicApis.slice(0, MAX_GUIDE_APIS);
  if (apis.length === 0) lines.push("_None found._");
  for (const api of apis) lines.push(`- \`${api.name}\` (${api.kind}) in \`${api.module}\``);
  if (index.publicApis.length > apis.length) {
    lines.push(`- ... and ${index.publicApis.length - apis.length} more`);
  }

  lines.push(
    "",
    `_${index.stats.totalFiles} files, ${index.stats.totalConcepts} concepts, ${index.stats.totalPublicApis} public APIs._`,
  );
  return lines.join("\n");
}

/** Count occurrences, most frequent first, ties alphabetical. */
function tally(values: readonly string[]): [string, number][] {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : 1));
}

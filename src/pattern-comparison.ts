import type { Detection, PatternComparison, ProjectAnalysis, ProjectComparison } from "./types.js";
import { formatPercent } from "./text-utils.js";

/**
 * Collect styles, design patterns and communication mechanisms per project.
 * Projects sharing a directory name get a numeric suffix.
 */
export function compareProjects(analyses: readonly ProjectAnalysis[]): PatternComparison {
  const projects: Record<string, ProjectComparison> = {};
  const styles = new Set<string>();
  const patterns = new Set<string>();
  const communication = new Set<string>();

  for (const analysis of analyses) {
    let key = analysis.name;
    for (let n = 2; key in projects; n++) key = `${analysis.name} (${n})`;

    projects[key] = {
      styles: analysis.architectureStyles.map((s) => s.name),
      styleDetails: analysis.architectureStyles,
      designPatterns: analysis.designPatterns.map((p) => p.name),
      patternDetails: analysis.designPatterns,
      communication: analysis.communicationPatterns.map((c) => c.name),
      packageCount: analysis.manifest.packageCount,
    };

    analysis.architectureStyles.forEach((s) => styles.add(s.name));
    analysis.designPatterns.forEach((p) => patterns.add(p.name));
    analysis.communicationPatterns.forEach((c) => communication.add(c.name));
  }

  return {
    projects,
    allStyles: [...styles].sort(),
    allPatterns: [...patterns].sort(),
    allCommunication: [...communication].sort(),
  };
}

export function formatComparisonMatrix(comparison: PatternComparison): string {
  const names = Object.keys(comparison.projects);
  const lines: string[] = [
    "# Pattern Cross-Reference Matrix",
    "",
    `Comparison of architectural patterns across ${names.length} projects.`,
    "",
    "## Architecture Styles",
    "",
    ...table("Style", names, comparison.allStyles, comparison.projects, (style, project) =>
      confidenceCell(project.styleDetails, style),
    ),
    "",
    "## Design Patterns",
    "",
    ...table("Pattern", names, comparison.allPatterns, comparison.projects, (pattern, project) =>
      confidenceCell(project.patternDetails, pattern),
    ),
    "",
    "## Communication Patterns",
    "",
    ...table("Pattern", names, comparison.allCommunication, comparison.projects, (pattern, project) =>
      project.communication.includes(pattern) ? "✅" : "❌",
    ),
    "",
    "## Project Summary",
    "",
    "| Project | Packages | Primary Style | Key Patterns |",
    "|---|---|---|---|",
  ];

  for (const name of names) {
    const project = comparison.projects[name];
    const primary = project.styles[0] ?? "N/A";
    const key = project.designPatterns.slice(0, 3).join(", ") || "N/A";
    lines.push(`| ${name} | ${project.packageCount} | ${primary} | ${key} |`);
  }

  return lines.join("\n") + "\n";
}

function table(
  label: string,
  names: string[],
  rows: string[],
  projects: Record<string, ProjectComparison>,
  cell: (row: string, project: ProjectComparison) => string,
): string[] {
  const lines = [
    `| ${label} | ${names.join(" | ")} |`,
    `|${Array(names.length + 1).fill("---").join("|")}|`,
  ];
  for (const row of rows) {
    lines.push(`| ${[row, ...names.map((n) => cell(row, projects[n]))].join(" | ")} |`);
  }
  return lines;
}

function confidenceCell(details: readonly Detection[], name: string): string {
  const match = details.find((d) => d.name === name);
  return match ? `✅ ${formatPercent(match.confidence)}` : "❌";
}

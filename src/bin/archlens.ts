#!/usr/bin/env node
// CLI entry point for archlens

import { writeFileSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { analyze, format, formatComparisonMatrix, ENGINE_VERSION } from "../index.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import type { OutputFormat, Warning } from "../types.js";

const OUTPUT_FILENAMES: Record<OutputFormat, string> = {
  json: "archlens-analysis.json",
  markdown: "ARCHITECTURE.md",
};

const MATRIX_FILENAME = "PATTERN_MATRIX.md";

const HELP_TEXT = `
archlens v${ENGINE_VERSION}

Usage:
  archlens [analyze] [paths...]        Recover the architecture of Rust projects

Arguments:
  paths                Project directories to analyze (default: current directory)
                       More than one path adds a cross-project pattern matrix.

Options:
  --format, -f         Output format: json, markdown (default: json)
  --output, -o         Output directory (default: current directory)
  --config, -c         Path to config file (default: archlens.config.json)
  --exclude, -e        Glob of project-relative paths to skip (repeatable)
  --include-tests      Also scan tests/, benches/, examples/ and friends
  --catalog            Path to a signature catalog JSON file
  --refine             Ask the LLM to refine detection confidences
  --quiet, -q          Suppress warnings
  --verbose, -v        Print per-project progress and timing
  --dry-run            Print structured analysis to stdout (no file write)
  --version, -V        Print the version
  --help, -h           Show this help text

Environment Variables:
  ANTHROPIC_API_KEY    Required for --refine
  ARCHLENS_LLM_MODEL   Model used by --refine

Examples:
  archlens ./my-crate
  archlens analyze ./my-crate --format markdown --output docs
  archlens ./tokio ./actix-web --format markdown
  archlens ./workspace --exclude "**/generated/**" --dry-run
`.trim();

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(0);
  }

  if (args.version) {
    process.stdout.write(`${ENGINE_VERSION}\n`);
    process.exit(0);
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);

  const analysis = await analyze(config);

  // Merge config-time warnings with analysis warnings
  analysis.warnings.unshift(...warnings);

  if (!args.quiet) {
    for (const w of analysis.warnings) {
      const where = w.file ? ` (${w.file})` : "";
      process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${where}\n`);
    }
  }

  if (args.dryRun) {
    process.stdout.write(format(analysis, "json"));
    process.exit(analysis.projects.length > 0 ? 0 : 1);
  }

  const outputPath = resolve(config.output.dir, OUTPUT_FILENAMES[config.output.format]);
  writeFileSafe(outputPath, format(analysis, config.output.format));
  if (!args.quiet) process.stderr.write(`Written to ${outputPath}\n`);

  if (config.output.format === "markdown" && analysis.comparison) {
    const matrixPath = resolve(config.output.dir, MATRIX_FILENAME);
    writeFileSafe(matrixPath, formatComparisonMatrix(analysis.comparison));
    if (!args.quiet) process.stderr.write(`Written to ${matrixPath}\n`);
  }

  process.exit(analysis.projects.length > 0 ? 0 : 1);
}

/** Auto-create output directory before writing. */
function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});

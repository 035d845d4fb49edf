// src/pipeline.ts — Pipeline Orchestrator
// Loads the signature catalogue once, analyzes each project independently,
// then optionally refines confidences and compares projects.

import { statSync } from "node:fs";
import { basename, resolve } from "node:path";
import type {
  ProjectAnalysis,
  ResolvedConfig,
  SignatureCatalog,
  StructuredAnalysis,
  Warning,
} from "./types.js";
import { ENGINE_VERSION, FileNotFoundError } from "./types.js";
import { toPublicConfig } from "./config.js";
import { loadSignatureCatalog } from "./signature-catalog.js";
import { readManifest } from "./manifest-reader.js";
import { buildKnowledgeGraph } from "./knowledge-graph.js";
import { detectSignatures } from "./pattern-detector.js";
import { detectArchitectureStyles, detectCommunicationPatterns } from "./architecture-detector.js";
import { buildSemanticIndex } from "./semantic-indexer.js";
import { summarizeApiSurface } from "./api-surface.js";
import { buildPatternLibrary } from "./pattern-library.js";
import { compareProjects } from "./pattern-comparison.js";
import { refineDetections } from "./llm/refiner.js";

/** Verbose logger: writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

/**
 * Run the full analysis pipeline for all projects. A project that throws
 * becomes an error warning; a bad catalogue is fatal.
 */
export async function runPipeline(
  config: ResolvedConfig,
): Promise<StructuredAnalysis> {
  const warnings: Warning[] = [];
  const startTime = performance.now();
  const verbose = config.verbose;

  const catalog = loadSignatureCatalog(config.catalog, warnings);
  vlog(
    verbose,
    `Signature catalog ${catalog.version}: ${catalog.designPatterns.length} patterns, ${catalog.architectureStyles.length} styles`,
  );

  const projects: ProjectAnalysis[] = [];
  for (const projectDir of config.projects) {
    try {
      projects.push(analyzeProject(projectDir, config, catalog, warnings));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "error",
        module: "pipeline",
        message: `Failed to analyze ${projectDir}: ${msg}`,
      });
    }
  }

  if (config.llm.refine && config.llm.apiKey) {
    for (const project of projects) {
      vlog(verbose, `Refining confidences for ${project.name}...`);
      const refined = await refineDetections(
        {
          project: project.name,
          architectureStyles: project.architectureStyles,
          designPatterns: project.designPatterns,
        },
        config.llm,
        warnings,
      );
      project.architectureStyles = refined.architectureStyles;
      project.designPatterns = refined.designPatterns;
      project.patternLibrary = buildPatternLibrary(refined.designPatterns, catalog.designPatterns);
    }
  }

  const comparison = projects.length > 1 ? compareProjects(projects) : undefined;
  if (comparison) {
    vlog(verbose, `Compared ${projects.length} projects: ${comparison.allStyles.length} styles, ${comparison.allPatterns.length} patterns`);
  }

  const totalMs = Math.round(performance.now() - startTime);
  vlog(verbose, `Total analysis time: ${totalMs}ms`);

  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      analyzedAt: new Date().toISOString(),
      catalogVersion: catalog.version,
      config: toPublicConfig(config),
      timingMs: totalMs,
    },
    projects,
    ...(comparison ? { comparison } : {}),
    warnings,
  };
}

/**
 * Analyze one project directory against a loaded catalogue.
 * Throws FileNotFoundError when the path is not an existing directory.
 */
export function analyzeProject(
  projectDir: string,
  config: Pick<ResolvedConfig, "exclude" | "includeTests" | "verbose">,
  catalog: SignatureCatalog,
  warnings: Warning[] = [],
): ProjectAnalysis {
  const verbose = config.verbose;
  const start = performance.now();
  if (!statSync(resolve(projectDir), { throwIfNoEntry: false })?.isDirectory()) {
    throw new FileNotFoundError(resolve(projectDir));
  }
  vlog(verbose, `Analyzing ${basename(projectDir)}...`);

  const manifest = readManifest(projectDir, warnings);
  vlog(
    verbose,
    `  Manifest: ${manifest.found ? `${manifest.packageCount} package(s)${manifest.isWorkspace ? ", workspace" : ""}` : "none"}`,
  );

  const { graph, files, corpus, metrics } = buildKnowledgeGraph(
    projectDir,
    { exclude: config.exclude, includeTests: config.includeTests },
    warnings,
  );
  vlog(verbose, `  Files: ${files.length} (${metrics.code} lines of code)`);
  vlog(
    verbose,
    `  Graph: ${graph.stats.totalNodes} entities, ${graph.stats.totalEdges} edges, ${graph.stats.totalClusters} clusters`,
  );

  const architectureStyles = detectArchitectureStyles(
    corpus,
    manifest.text,
    manifest,
    catalog.architectureStyles,
    warnings,
  );
  const designPatterns = detectSignatures(corpus, manifest.text, catalog.designPatterns, { warnings });
  const communicationPatterns = detectCommunicationPatterns(
    corpus,
    manifest.text,
    catalog.communicationPatterns,
  );
  vlog(
    verbose,
    `  Detected: ${architectureStyles.length} styles, ${designPatterns.length} patterns, ${communicationPatterns.length} communication`,
  );

  const semanticIndex = buildSemanticIndex(graph.nodes, graph.edges, files);
  const apiSurface = summarizeApiSurface(graph.nodes);

  const { text: _text, ...manifestSummary } = manifest;
  vlog(verbose, `  Done in ${Math.round(performance.now() - start)}ms`);

  return {
    name: manifest.name ?? graph.project,
    rootDir: projectDir,
    manifest: manifestSummary,
    files,
    metrics,
    graph,
    architectureStyles,
    designPatterns,
    communicationPatterns,
    patternLibrary: buildPatternLibrary(designPatterns, catalog.designPatterns),
    semanticIndex,
    apiSurface,
  };
}

// src/config.ts — Config Resolver
// defaults ← archlens.config.json (or "archlens" in package.json, or --config)
// ← CLI flags. Warns when an API key is stored in a config file.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { ResolvedConfig, OutputFormat, PublicConfig, Warning } from "./types.js";

export interface ParsedArgs {
  projects: string[];
  format?: string;
  output?: string;
  config?: string;
  exclude: string[];
  catalog?: string;
  includeTests: boolean;
  refine: boolean;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
  version: boolean;
}

/** Shape accepted from archlens.config.json. Every field is optional. */
export interface FileConfig {
  projects?: string[];
  exclude?: string[];
  includeTests?: boolean;
  catalog?: string;
  output?: { format?: OutputFormat; dir?: string };
  llm?: { model?: string; apiKey?: string; baseUrl?: string; maxOutputTokens?: number; refine?: boolean };
}

export const CONFIG_FILE_NAME = "archlens.config.json";
const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "markdown"];

/** Built-in defaults, shared by the CLI and the library API. */
export function defaultConfig(): ResolvedConfig {
  return {
    projects: ["."],
    exclude: [],
    includeTests: false,
    output: {
      format: "json",
      dir: ".",
    },
    llm: {
      provider: "anthropic",
      model: process.env.ARCHLENS_LLM_MODEL ?? "claude-sonnet-4-20250514",
      maxOutputTokens: 2048,
      refine: false,
    },
    verbose: false,
  };
}

/**
 * Resolve config from CLI args, config file, and defaults.
 * `cwd` is where archlens.config.json and package.json are looked up.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const base = defaultConfig();
  const fileConfig = loadConfigFile(args.config, warnings, cwd);

  const format = args.format ?? fileConfig?.output?.format ?? base.output.format;
  if (!isOutputFormat(format)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Unknown format "${format}", using json. Expected one of: ${OUTPUT_FORMATS.join(", ")}`,
    });
  }

  const config: ResolvedConfig = {
    projects:
      args.projects.length > 0
        ? args.projects.map((p) => resolve(cwd, p))
        : (fileConfig?.projects ?? base.projects).map((p) => resolve(cwd, p)),
    exclude: [...(fileConfig?.exclude ?? []), ...args.exclude],
    includeTests: args.includeTests || (fileConfig?.includeTests ?? base.includeTests),
    catalog: args.catalog
      ? resolve(cwd, args.catalog)
      : fileConfig?.catalog
        ? resolve(cwd, fileConfig.catalog)
        : undefined,
    output: {
      format: isOutputFormat(format) ? format : "json",
      dir: args.output ?? fileConfig?.output?.dir ?? base.output.dir,
    },
    llm: {
      ...base.llm,
      ...fileConfig?.llm,
      provider: "anthropic",
      apiKey: process.env.ANTHROPIC_API_KEY ?? fileConfig?.llm?.apiKey,
      refine: args.refine || (fileConfig?.llm?.refine ?? base.llm.refine),
    },
    verbose: args.verbose,
  };

  if (config.llm.refine && !config.llm.apiKey && !args.dryRun) {
    warnings.push({
      level: "warn",
      module: "config",
      message: "--refine requires an API key. Set ANTHROPIC_API_KEY; heuristic confidences will be used.",
    });
  }

  return config;
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // archlens key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && isRecord(pkg.archlens)) {
        return toFileConfig(pkg.archlens, pkgJson, warnings);
      }
    } catch {
      // Invalid package.json is not ours to report
    }
  }

  return null;
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
): FileConfig | null {
  try {
    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file ${filePath} must contain a JSON object`,
      });
      return null;
    }
    return toFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

/**
 * Keep only well-typed fields; anything else is reported and dropped.
 */
export function toFileConfig(
  raw: Record<string, unknown>,
  source: string,
  warnings: Warning[],
): FileConfig {
  const config: FileConfig = {};
  const drop = (field: string) =>
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring invalid "${field}" in ${source}`,
    });

  if (raw.projects !== undefined) {
    if (isStringArray(raw.projects)) config.projects = raw.projects;
    else drop("projects");
  }
  if (raw.exclude !== undefined) {
    if (isStringArray(raw.exclude)) config.exclude = raw.exclude;
    else drop("exclude");
  }
  if (raw.includeTests !== undefined) {
    if (typeof raw.includeTests === "boolean") config.includeTests = raw.includeTests;
    else drop("includeTests");
  }
  if (raw.catalog !== undefined) {
    if (typeof raw.catalog === "string") config.catalog = raw.catalog;
    else drop("catalog");
  }

  if (isRecord(raw.output)) {
    const { format, dir } = raw.output;
    config.output = {};
    if (typeof format === "string" && isOutputFormat(format)) config.output.format = format;
    else if (format !== undefined) drop("output.format");
    if (typeof dir === "string") config.output.dir = dir;
    else if (dir !== undefined) drop("output.dir");
  }

  if (isRecord(raw.llm)) {
    const llm = raw.llm;
    config.llm = {};
    if (typeof llm.model === "string") config.llm.model = llm.model;
    if (typeof llm.baseUrl === "string") config.llm.baseUrl = llm.baseUrl;
    if (typeof llm.maxOutputTokens === "number") config.llm.maxOutputTokens = llm.maxOutputTokens;
    if (typeof llm.refine === "boolean") config.llm.refine = llm.refine;
    if (typeof llm.apiKey === "string" && llm.apiKey) {
      warnings.push({
        level: "warn",
        module: "config",
        message:
          "API keys should not be stored in config files. Use ANTHROPIC_API_KEY environment variable instead.",
      });
      config.llm.apiKey = llm.apiKey;
    }
  }

  return config;
}

interface CliFlags {
  _: string[];
  format?: string;
  output?: string;
  config?: string;
  catalog?: string;
  exclude?: string | string[];
  "include-tests"?: boolean;
  refine?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  "dry-run"?: boolean;
  help?: boolean;
  version?: boolean;
}

/**
 * Parse CLI args using mri. A leading `analyze` command word is accepted and
 * dropped.
 */
export async function parseCliArgs(
  argv: string[],
): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri<CliFlags>(argv, {
    alias: { f: "format", o: "output", c: "config", e: "exclude", q: "quiet", v: "verbose", h: "help", V: "version" },
    boolean: ["dry-run", "quiet", "verbose", "help", "version", "include-tests", "refine"],
    string: ["format", "output", "config", "catalog", "exclude"],
  });

  const positionals = args._.map(String);
  if (positionals[0] === "analyze") positionals.shift();

  const exclude = args.exclude === undefined ? [] : Array.isArray(args.exclude) ? args.exclude : [args.exclude];

  return {
    projects: positionals,
    format: args.format || undefined,
    output: args.output || undefined,
    config: args.config || undefined,
    catalog: args.catalog || undefined,
    exclude: exclude.filter((e) => e.length > 0),
    includeTests: args["include-tests"] ?? false,
    refine: args.refine ?? false,
    quiet: args.quiet ?? false,
    verbose: args.verbose ?? false,
    dryRun: args["dry-run"] ?? false,
    help: args.help ?? false,
    version: args.version ?? false,
  };
}

/** Strip the API key before the config is echoed into output. */
export function toPublicConfig(config: ResolvedConfig): PublicConfig {
  const { apiKey: _apiKey, ...llm } = config.llm;
  return { ...config, llm };
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  parseCliArgs,
  resolveConfig,
  toPublicConfig,
  type ParsedArgs,
} from "../src/config.js";
import type { Warning } from "../src/types.js";

function baseArgs(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return {
    projects: [],
    exclude: [],
    includeTests: false,
    refine: false,
    quiet: false,
    verbose: false,
    dryRun: false,
    help: false,
    version: false,
    ...overrides,
  };
}

describe("parseCliArgs", () => {
  it("drops a leading analyze and collects repeated excludes", async () => {
    const args = await parseCliArgs([
      "analyze",
      "./a",
      "./b",
      "--exclude",
      "gen/**",
      "--exclude",
      "vendor/**",
      "-f",
      "markdown",
      "--include-tests",
      "--dry-run",
    ]);
    expect(args.projects).toEqual(["./a", "./b"]);
    expect(args.exclude).toEqual(["gen/**", "vendor/**"]);
    expect(args.format).toBe("markdown");
    expect(args.includeTests).toBe(true);
    expect(args.dryRun).toBe(true);
    expect(args.refine).toBe(false);
  });

  it("accepts a single exclude and short flags", async () => {
    const args = await parseCliArgs(["-e", "gen/**", "-q", "-o", "docs", "--catalog", "cat.json"]);
    expect(args.projects).toEqual([]);
    expect(args.exclude).toEqual(["gen/**"]);
    expect(args.quiet).toBe(true);
    expect(args.output).toBe("docs");
    expect(args.catalog).toBe("cat.json");
  });
});

describe("resolveConfig", () => {
  let cwd: string;
  let savedKey: string | undefined;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "archlens-config-"));
    savedKey = process.env.ANTHROPIC_API_KEY;
    delete process.env.ANTHROPIC_API_KEY;
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
    if (savedKey === undefined) delete process.env.ANTHROPIC_API_KEY;
    else process.env.ANTHROPIC_API_KEY = savedKey;
  });

  it("uses defaults without a config file", () => {
    const warnings: Warning[] = [];
    const config = resolveConfig(baseArgs(), warnings, cwd);
    expect(config.projects).toEqual([cwd]);
    expect(config.exclude).toEqual([]);
    expect(config.output).toEqual({ format: "json", dir: "." });
    expect(config.llm.refine).toBe(false);
    expect(config.llm.apiKey).toBeUndefined();
    expect(warnings).toEqual([]);
  });

  it("merges archlens.config.json under CLI flags", () => {
    writeFileSync(
      join(cwd, "archlens.config.json"),
      JSON.stringify({
        projects: ["crates/a"],
        exclude: ["gen/**"],
        output: { format: "markdown", dir: "docs" },
      }),
    );
    const config = resolveConfig(baseArgs({ exclude: ["vendor/**"], output: "out" }), [], cwd);
    expect(config.projects).toEqual([join(cwd, "crates/a")]);
    expect(config.exclude).toEqual(["gen/**", "vendor/**"]);
    expect(config.output).toEqual({ format: "markdown", dir: "out" });
  });

  it("reads the archlens key of package.json", () => {
    writeFileSync(join(cwd, "package.json"), JSON.stringify({ name: "x", archlens: { includeTests: true } }));
    expect(resolveConfig(baseArgs(), [], cwd).includeTests).toBe(true);
  });

  it("warns about an API key stored in the config file", () => {
    writeFileSync(join(cwd, "archlens.config.json"), JSON.stringify({ llm: { apiKey: "test-secret" } }));
    const warnings: Warning[] = [];
    const config = resolveConfig(baseArgs(), warnings, cwd);
    expect(config.llm.apiKey).toBe("test-secret");
    expect(warnings.map((w) => w.message)).toEqual([
      "API keys should not be stored in config files. Use ANTHROPIC_API_KEY environment variable instead.",
    ]);
  });

  it("prefers the environment key", () => {
    process.env.ANTHROPIC_API_KEY = "test-secret";
    expect(resolveConfig(baseArgs(), [], cwd).llm.apiKey).toBe("test-secret");
  });

  it("falls back to json for an unknown format", () => {
    const warnings: Warning[] = [];
    const config = resolveConfig(baseArgs({ format: "yaml" }), warnings, cwd);
    expect(config.output.format).toBe("json");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Unknown format "yaml", using json. Expected one of: json, markdown');
  });

  it("warns when --refine has no key", () => {
    const warnings: Warning[] = [];
    resolveConfig(baseArgs({ refine: true }), warnings, cwd);
    expect(warnings.map((w) => w.module)).toEqual(["config"]);

    const dryRun: Warning[] = [];
    resolveConfig(baseArgs({ refine: true, dryRun: true }), dryRun, cwd);
    expect(dryRun).toEqual([]);
  });

  it("drops ill-typed fields with a warning", () => {
    writeFileSync(join(cwd, "archlens.config.json"), JSON.stringify({ exclude: "gen/**", includeTests: "yes" }));
    const warnings: Warning[] = [];
    const config = resolveConfig(baseArgs(), warnings, cwd);
    expect(config.exclude).toEqual([]);
    expect(config.includeTests).toBe(false);
    expect(warnings).toHaveLength(2);
  });

  it("warns about a missing explicit config file", () => {
    const warnings: Warning[] = [];
    resolveConfig(baseArgs({ config: "nope.json" }), warnings, cwd);
    expect(warnings.map((w) => w.message)).toEqual(["Config file not found: nope.json"]);
  });
});

describe("toPublicConfig", () => {
  it("removes the API key", () => {
    const config = resolveConfig(baseArgs(), [], tmpdir());
    config.llm.apiKey = "test-secret";
    const publicConfig = toPublicConfig(config);
    expect("apiKey" in publicConfig.llm).toBe(false);
    expect(publicConfig.llm.model).toBe(config.llm.model);
  });
});

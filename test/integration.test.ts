import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { analyze, analyzeProject, format } from "../src/index.js";
import { loadSignatureCatalog } from "../src/signature-catalog.js";
import { FileNotFoundError } from "../src/types.js";

const FIXTURES = fileURLToPath(new URL("./fixtures", import.meta.url));
const SAMPLE = join(FIXTURES, "sample-crate");
const WORKSPACE = join(FIXTURES, "workspace");
const catalog = loadSignatureCatalog();

describe("integration: analyze()", () => {
  it("analyzes sample-crate end-to-end", async () => {
    const result = await analyze({ projects: [SAMPLE] });

    expect(result.projects).toHaveLength(1);
    expect(result.comparison).toBeUndefined();
    expect(result.meta.catalogVersion).toBe("2024.1");
    expect(result.meta.config.projects).toEqual([SAMPLE]);

    const project = result.projects[0];
    expect(project.name).toBe("sample-crate");
    expect(project.rootDir).toBe(SAMPLE);
    expect(project.manifest).toEqual({
      found: true,
      name: "sample-crate",
      version: "0.1.0",
      isWorkspace: false,
      packageCount: 1,
      packages: [
        {
          name: "sample-crate",
          path: ".",
          version: "0.1.0",
          description: "Orders fixture",
          dependencies: ["thiserror", "tokio"],
        },
      ],
    });
    expect(project.files).toHaveLength(4);
    expect(project.graph.stats.totalNodes).toBe(14);

    expect(project.architectureStyles).toEqual([
      {
        name: "Reactor/Proactor",
        confidence: 2 / 6,
        evidence: ["keyword: async fn", "keyword: .await"],
        description: "Async I/O with an event loop (Tokio, async-std style)",
      },
    ]);

    expect(project.designPatterns.map((p) => [p.name, p.confidence, p.evidence])).toEqual([
      ["Error Handling (thiserror)", 2 / 3, ["import: thiserror"]],
      [
        "Async/Await Runtime",
        0.5,
        ["keyword: #[tokio::main]", "keyword: async fn", "keyword: .await", "import: tokio"],
      ],
    ]);

    expect(project.communicationPatterns).toEqual([
      { name: "Shared State (Mutex)", evidence: ["Arc<Mutex", "Mutex<"], usageCount: 2 },
    ]);
  });

  it("builds the semantic index and API surface", async () => {
    const [project] = (await analyze({ projects: [SAMPLE] })).projects;
    const index = project.semanticIndex;

    expect(index.entryPoints).toEqual([
      { file: "src/main.rs", type: "main", description: "Binary entry point" },
      { file: "src/main.rs", type: "main_function", description: "main() function" },
    ]);
    expect(index.hotSpots.slice(0, 4)).toEqual([
      { name: "Order", degree: 5 },
      { name: "main", degree: 4 },
      { name: "Customer", degree: 3 },
      { name: "field_usage", degree: 3 },
    ]);
    expect(index.hotSpots).toHaveLength(13);
    expect(index.publicApis.map((a) => a.name)).toEqual([
      "Order",
      "Customer",
      "Repository",
      "OrderService",
      "place",
      "run",
      "format_id",
    ]);
    expect(index.conceptToFiles.OrderService).toEqual(["src/service/order_service.rs"]);

    expect(project.apiSurface.stats.totalItems).toBe(8);
    expect(project.apiSurface.byVisibility["pub(crate)"]).toEqual(["MAX_ORDERS"]);
  });

  it("recognizes a multi-crate workspace", async () => {
    const [project] = (await analyze({ projects: [WORKSPACE] })).projects;
    expect(project.name).toBe("workspace");
    expect(project.manifest.packageCount).toBe(5);
    expect(project.files).toEqual(["crates/core/src/lib.rs"]);
    expect(project.architectureStyles[0]).toEqual({
      name: "Multi-Crate Workspace",
      confidence: 0.9,
      evidence: ["Workspace with 5 packages"],
      description: "Multiple crates in a workspace, each with specific responsibility",
    });
    expect(project.graph.nodes.map((n) => n.name)).toEqual(["Engine"]);
  });

  it("handles a crate with no manifest and no sources", async () => {
    const result = await analyze({ projects: [join(FIXTURES, "empty-crate")] });
    const [project] = result.projects;
    expect(project.name).toBe("empty-crate");
    expect(project.manifest.found).toBe(false);
    expect(project.graph.stats).toEqual({
      totalNodes: 0,
      totalEdges: 0,
      totalClusters: 0,
      totalCandidates: 0,
    });
    expect(project.architectureStyles).toEqual([]);
    expect(project.designPatterns).toEqual([]);
    expect(project.semanticIndex.stats.totalEntryPoints).toBe(0);
  });

  it("compares several projects", async () => {
    const result = await analyze({ projects: [SAMPLE, WORKSPACE] });
    expect(result.comparison?.allStyles).toEqual(["Multi-Crate Workspace", "Reactor/Proactor"]);
    expect(result.comparison?.allPatterns).toEqual(["Async/Await Runtime", "Error Handling (thiserror)"]);
    expect(Object.keys(result.comparison?.projects ?? {})).toEqual(["sample-crate", "workspace"]);
  });

  it("honours exclude and includeTests", async () => {
    const excluded = await analyze({ projects: [SAMPLE], exclude: ["src/util/**"] });
    expect(excluded.projects[0].files).not.toContain("src/util/helpers.rs");

    const withTests = await analyze({ projects: [SAMPLE], includeTests: true });
    expect(withTests.projects[0].files).toContain("src/util/helpers_test.rs");
  });

  it("skips a missing project directory with an error", async () => {
    const missing = join(FIXTURES, "missing-project");
    const result = await analyze({ projects: [missing, SAMPLE] });
    expect(result.projects.map((p) => p.name)).toEqual(["sample-crate"]);
    expect(result.warnings).toContainEqual({
      level: "error",
      module: "pipeline",
      message: `Failed to analyze ${missing}: File not found: ${missing}`,
    });

    const alone = await analyze({ projects: [missing] });
    expect(alone.projects).toHaveLength(0);
  });

  it("throws FileNotFoundError for a file given as project", () => {
    expect(() =>
      analyzeProject(join(SAMPLE, "Cargo.toml"), { exclude: [], includeTests: false, verbose: false }, catalog),
    ).toThrow(FileNotFoundError);
  });

  it("takes the model from ARCHLENS_LLM_MODEL like the CLI", async () => {
    const saved = process.env.ARCHLENS_LLM_MODEL;
    process.env.ARCHLENS_LLM_MODEL = "test-model";
    try {
      const result = await analyze({ projects: [SAMPLE] });
      expect(result.meta.config.llm.model).toBe("test-model");
    } finally {
      if (saved === undefined) delete process.env.ARCHLENS_LLM_MODEL;
      else process.env.ARCHLENS_LLM_MODEL = saved;
    }
  });

  it("produces deterministic output apart from run metadata", async () => {
    const first = await analyze({ projects: [SAMPLE] });
    const second = await analyze({ projects: [SAMPLE] });
    expect(second.projects).toEqual(first.projects);
  });

  it("formats JSON and markdown", async () => {
    const result = await analyze({ projects: [SAMPLE] });

    const json = format(result, "json");
    expect(json.endsWith("}\n")).toBe(true);
    expect(JSON.parse(json).projects[0].name).toBe("sample-crate");

    const md = format(result, "markdown");
    expect(md.startsWith("# Architecture Overview\n")).toBe(true);
    expect(md).toContain("## sample-crate\n");
  });
});

import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { extractEntities, parseVisibility, findDocBlocks } from "../src/entity-extractor.js";
import { ENTITY_KINDS, VISIBILITIES, InvalidArgumentError } from "../src/types.js";

const FIXTURES = fileURLToPath(new URL("./fixtures", import.meta.url));

function summary(text: string) {
  return extractEntities(text, "src/lib.rs").map((e) => [e.kind, e.name, e.visibility, e.line]);
}

describe("extractEntities", () => {
  it("recognizes every declaration kind", () => {
    const text = [
      "pub struct Point;",
      "enum Shape {}",
      "pub(crate) trait Draw {}",
      "pub async fn render() {}",
      "mod geometry;",
      "impl Draw for Point {}",
      "pub type Id = u32;",
      "const LIMIT: u32 = 4;",
      "pub static mut COUNTER: u32 = 0;",
    ].join("\n");

    expect(summary(text)).toEqual([
      ["struct", "Point", "pub", 1],
      ["enum", "Shape", "private", 2],
      ["trait", "Draw", "pub(crate)", 3],
      ["fn", "render", "pub", 4],
      ["mod", "geometry", "private", 5],
      ["impl", "Draw", "private", 6],
      ["type", "Id", "pub", 7],
      ["const", "LIMIT", "private", 8],
      ["static", "COUNTER", "pub", 9],
    ]);
  });

  it("records the module path on every entity", () => {
    const entities = extractEntities("pub struct A;", "src/net/tcp.rs");
    expect(entities[0].module).toBe("src/net/tcp.rs");
  });

  it("treats const fn as a function, not a constant", () => {
    expect(summary("pub const fn zero() -> u32 { 0 }")).toEqual([["fn", "zero", "pub", 1]]);
  });

  it("handles qualified functions and traits", () => {
    const text = [
      'pub unsafe extern "C" fn ffi_entry() {}',
      "pub unsafe trait Zeroable {}",
      "pub extern fn callback() {}",
    ].join("\n");
    expect(summary(text)).toEqual([
      ["fn", "ffi_entry", "pub", 1],
      ["trait", "Zeroable", "pub", 2],
      ["fn", "callback", "pub", 3],
    ]);
  });

  it("reports the line of the name when a declaration spans lines", () => {
    expect(summary("pub struct\n    Wide;")).toEqual([["struct", "Wide", "pub", 2]]);
  });

  it("parses restricted visibility on declarations", () => {
    const text = [
      "pub(in crate::net) struct Socket;",
      "pub(super) fn helper() {}",
      "pub(self) enum Local {}",
    ].join("\n");
    expect(extractEntities(text, "src/lib.rs").map((e) => e.visibility)).toEqual([
      "pub(in ...)",
      "pub(super)",
      "pub(self)",
    ]);
  });

  it("excludes self, Self and other noisy names", () => {
    const text = ["pub fn self() {}", "struct Self;", "fn new() {}", "fn default() {}", "pub fn keep() {}"].join("\n");
    expect(extractEntities(text, "src/lib.rs").map((e) => e.name)).toEqual(["keep"]);
  });

  it("reports repeated declarations as separate candidates", () => {
    const entities = extractEntities("struct A;\nstruct A;", "src/lib.rs");
    expect(entities.map((e) => e.line)).toEqual([1, 2]);
  });

  it("returns an empty list for empty text", () => {
    expect(extractEntities("", "src/lib.rs")).toEqual([]);
  });

  it("is idempotent", () => {
    const text = readFileSync(`${FIXTURES}/sample-crate/src/service/order_service.rs`, "utf-8");
    const first = extractEntities(text, "src/service/order_service.rs");
    const second = extractEntities(text, "src/service/order_service.rs");
    expect(second).toEqual(first);
  });

  it("only produces declared kinds and canonical visibilities", () => {
    for (const file of ["src/main.rs", "src/domain/order.rs", "src/service/order_service.rs", "src/util/helpers.rs"]) {
      const text = readFileSync(`${FIXTURES}/sample-crate/${file}`, "utf-8");
      for (const entity of extractEntities(text, file)) {
        expect(ENTITY_KINDS).toContain(entity.kind);
        expect(VISIBILITIES).toContain(entity.visibility);
      }
    }
  });

  it("rejects an empty file path", () => {
    expect(() => extractEntities("struct A;", "")).toThrow(InvalidArgumentError);
  });
});

describe("parseVisibility", () => {
  it("picks the most specific qualifier", () => {
    expect(parseVisibility("pub(in crate::a::b)")).toBe("pub(in ...)");
    expect(parseVisibility("pub(self)")).toBe("pub(self)");
    expect(parseVisibility("pub(super)")).toBe("pub(super)");
    expect(parseVisibility("pub(crate)")).toBe("pub(crate)");
    expect(parseVisibility("pub (crate)")).toBe("pub(crate)");
    expect(parseVisibility("pub")).toBe("pub");
  });

  it("defaults to private", () => {
    expect(parseVisibility(undefined)).toBe("private");
    expect(parseVisibility("")).toBe("private");
  });
});

describe("doc comments", () => {
  it("attaches a /// run through attributes", () => {
    const text = [
      "/// Shared connection pool.",
      "/// Cloned cheaply.",
      "#[derive(Clone)]",
      "pub struct Pool;",
    ].join("\n");
    const [pool] = extractEntities(text, "src/pool.rs");
    expect(pool.doc).toBe("Shared connection pool.\nCloned cheaply.");
  });

  it("attaches a /** */ block", () => {
    const text = ["/**", " * Parses input.", " */", "fn parse() {}"].join("\n");
    const [parse] = extractEntities(text, "src/parse.rs");
    expect(parse.doc).toBe("Parses input.");
  });

  it("attaches a doc up to five lines away", () => {
    const text = ["/// Near.", "", "", "", "", "struct Near;"].join("\n");
    expect(extractEntities(text, "src/lib.rs")[0].doc).toBe("Near.");
  });

  it("drops a doc more than five lines away", () => {
    const text = ["/// Far.", "", "", "", "", "", "", "struct Far;"].join("\n");
    expect(extractEntities(text, "src/lib.rs")[0].doc).toBeUndefined();
  });

  it("ignores plain and quadruple-slash comments", () => {
    const text = ["// note", "fn a() {}", "//// banner", "fn b() {}"].join("\n");
    expect(extractEntities(text, "src/lib.rs").map((e) => e.doc)).toEqual([undefined, undefined]);
  });

  it("truncates long docs to 200 characters", () => {
    const text = `/// ${"x".repeat(250)}\nstruct Long;`;
    expect(extractEntities(text, "src/lib.rs")[0].doc).toHaveLength(200);
  });

  it("finds the documented line of each block", () => {
    const blocks = findDocBlocks(["/// One.", "#[inline]", "fn one() {}", "/// Two.", "fn two() {}"].join("\n"));
    expect(blocks.map((b) => [b.startLine, b.endLine, b.targetLine, b.text])).toEqual([
      [1, 1, 3, "One."],
      [4, 4, 5, "Two."],
    ]);
  });
});

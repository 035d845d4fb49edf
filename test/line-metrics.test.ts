import { describe, it, expect } from "vitest";
import { countLines, aggregateLineMetrics } from "../src/line-metrics.js";

describe("countLines", () => {
  it("splits code, comments and blanks", () => {
    expect(countLines("fn a() {}\n// note\n\n  /* block */\n")).toEqual({
      lines: 5,
      code: 1,
      comments: 2,
      blanks: 2,
    });
  });

  it("counts doc comments as comments", () => {
    expect(countLines("/// Doc.\n//! Crate doc.\nstruct A;")).toEqual({
      lines: 3,
      code: 1,
      comments: 2,
      blanks: 0,
    });
  });

  it("returns zeros for empty text", () => {
    expect(countLines("")).toEqual({ lines: 0, code: 0, comments: 0, blanks: 0 });
  });
});

describe("aggregateLineMetrics", () => {
  it("sums every file", () => {
    expect(aggregateLineMetrics(["fn a() {}", "// x\n"])).toEqual({
      files: 2,
      lines: 3,
      code: 1,
      comments: 1,
      blanks: 1,
    });
  });
});

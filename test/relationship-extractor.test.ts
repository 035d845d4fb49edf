import { describe, it, expect } from "vitest";
import { extractEntities } from "../src/entity-extractor.js";
import { extractRelationships } from "../src/relationship-extractor.js";
import { InvalidArgumentError } from "../src/types.js";

const NONE: ReadonlySet<string> = new Set();

describe("extractRelationships", () => {
  it("links a field type to a known struct", () => {
    const text = "pub struct Foo { bar: Bar }\npub struct Bar;";
    const entities = extractEntities(text, "src/lib.rs");
    expect(entities.map((e) => [e.name, e.kind, e.visibility])).toEqual([
      ["Foo", "struct", "pub"],
      ["Bar", "struct", "pub"],
    ]);

    const known = new Set(entities.map((e) => e.name));
    expect(extractRelationships(text, "src/lib.rs", known)).toEqual([
      { from: "field_usage", to: "Bar", relationship: "references", source: "src/lib.rs" },
    ]);
  });

  it("emits implements edges with the trait's last path segment", () => {
    const text = "impl<T> fmt::Display for Wrapper<T> {}\nimpl From<u8> for Code {}";
    expect(extractRelationships(text, "src/lib.rs", NONE)).toEqual([
      { from: "Wrapper", to: "Display", relationship: "implements", source: "src/lib.rs" },
      { from: "Code", to: "From", relationship: "implements", source: "src/lib.rs" },
    ]);
  });

  it("emits one derives edge per derived trait", () => {
    const text = [
      "#[derive(Debug, PartialEq)]",
      '#[serde(rename_all = "camelCase")]',
      "pub enum Mode { A }",
    ].join("\n");
    expect(extractRelationships(text, "src/mode.rs", NONE)).toEqual([
      { from: "Mode", to: "Debug", relationship: "derives", source: "src/mode.rs" },
      { from: "Mode", to: "PartialEq", relationship: "derives", source: "src/mode.rs" },
    ]);
  });

  it("hangs module declarations off the file stem", () => {
    expect(extractRelationships("pub mod tcp;\nmod udp;", "src/net.rs", NONE)).toEqual([
      { from: "net", to: "tcp", relationship: "contains", source: "src/net.rs" },
      { from: "net", to: "udp", relationship: "contains", source: "src/net.rs" },
    ]);
  });

  it("only links imports whose last segment is a known entity", () => {
    const text = "use crate::store::Db;\nuse std::collections::HashMap;\nuse std::sync::{Arc, Mutex};";
    expect(extractRelationships(text, "src/app.rs", new Set(["Db"]))).toEqual([
      { from: "app", to: "Db", relationship: "uses", source: "src/app.rs" },
    ]);
  });

  it("unwraps one layer of Option, Vec, Box, Arc and Rc", () => {
    const text = [
      "struct S {",
      "    a: Option<Config>,",
      "    b: Vec<Config>,",
      "    c: &mut Config,",
      "    d: u64,",
      "    e: Box<Other>,",
      "}",
    ].join("\n");
    const edges = extractRelationships(text, "src/s.rs", new Set(["Config"]));
    expect(edges).toHaveLength(3);
    expect(edges.every((e) => e.from === "field_usage" && e.to === "Config")).toBe(true);
  });

  it("never references primitive types, even when named as entities", () => {
    expect(extractRelationships("struct N { name: String }", "src/n.rs", new Set(["String"]))).toEqual([]);
  });

  it("orders edges by kind: implements, derives, contains, uses, references", () => {
    const text = [
      "mod a;",
      "#[derive(Clone)]",
      "struct B { c: C }",
      "impl Tr for B {}",
      "use crate::C;",
    ].join("\n");
    const edges = extractRelationships(text, "src/x.rs", new Set(["B", "C"]));
    expect(edges.map((e) => [e.relationship, e.from, e.to])).toEqual([
      ["implements", "B", "Tr"],
      ["derives", "B", "Clone"],
      ["contains", "x", "a"],
      ["uses", "x", "C"],
      ["references", "field_usage", "C"],
    ]);
  });

  it("matches inside comments, since scanning is purely lexical", () => {
    const edges = extractRelationships("// impl Debug for Thing", "src/c.rs", NONE);
    expect(edges).toEqual([
      { from: "Thing", to: "Debug", relationship: "implements", source: "src/c.rs" },
    ]);
  });

  it("is deterministic", () => {
    const text = "#[derive(Clone)]\nstruct B { c: C }\nuse crate::C;";
    const known = new Set(["B", "C"]);
    expect(extractRelationships(text, "src/x.rs", known)).toEqual(
      extractRelationships(text, "src/x.rs", known),
    );
  });

  it("rejects an empty file path", () => {
    expect(() => extractRelationships("mod a;", "", NONE)).toThrow(InvalidArgumentError);
  });
});

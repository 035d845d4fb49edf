// src/entity-extractor.ts — Entity Extractor
// Lexical declaration scanner. One tagged pattern per declaration kind; a real
// parser can replace the table without changing the Entity contract.
//
// Matches inside comments and string literals are not filtered out.

import type { Entity, EntityKind, Visibility } from "./types.js";
import { buildLineIndex, lineAt, assertArgument } from "./text-utils.js";

/** Identifiers that are either keywords or too common to carry meaning. */
export const EXCLUDED_NAMES: ReadonlySet<string> = new Set([
  "self",
  "Self",
  "crate",
  "super",
  "new",
  "default",
  "from",
  "into",
  "as_ref",
  "as_mut",
]);

const MAX_DOC_LENGTH = 200;
const MAX_DOC_DISTANCE = 5;

const VIS = String.raw`(?:\b(?<vis>pub(?:\s*\([^)]*\))?)\s+)?`;

interface EntityPattern {
  kind: EntityKind;
  regex: RegExp;
}

const ENTITY_PATTERNS: readonly EntityPattern[] = [
  { kind: "struct", regex: new RegExp(VIS + String.raw`\bstruct\s+(?<name>\w+)`, "g") },
  { kind: "enum", regex: new RegExp(VIS + String.raw`\benum\s+(?<name>\w+)`, "g") },
  { kind: "trait", regex: new RegExp(VIS + String.raw`(?:(?:unsafe|auto)\s+)*\btrait\s+(?<name>\w+)`, "g") },
  {
    kind: "fn",
    regex: new RegExp(
      VIS + String.raw`(?:(?:const|async|unsafe)\s+)*(?:extern\s+(?:"[^"]*"\s+)?)?\bfn\s+(?<name>\w+)`,
      "g",
    ),
  },
  { kind: "mod", regex: new RegExp(VIS + String.raw`\bmod\s+(?<name>\w+)`, "g") },
  { kind: "impl", regex: /\bimpl(?:<[^>]*>)?\s+(?<name>\w+)/g },
  { kind: "type", regex: new RegExp(VIS + String.raw`\btype\s+(?<name>\w+)`, "g") },
  {
    kind: "const",
    regex: new RegExp(VIS + String.raw`\bconst\s+(?!(?:fn|unsafe|async|extern)\b)(?<name>\w+)`, "g"),
  },
  { kind: "static", regex: new RegExp(VIS + String.raw`(?<!')\bstatic\s+(?:mut\s+)?(?<name>\w+)`, "g") },
];

const KIND_ORDER = new Map<EntityKind, number>(
  ENTITY_PATTERNS.map((p, i) => [p.kind, i]),
);

/**
 * Extract every declaration-like occurrence in a file.
 *
 * Repeated (kind, name) pairs are all reported; collapsing by name happens
 * when the knowledge graph is assembled. Results are ordered by line, then by
 * declaration kind.
 */
export function extractEntities(text: string, filePath: string): Entity[] {
  assertArgument(typeof text === "string", "extractEntities: text must be a string");
  assertArgument(
    typeof filePath === "string" && filePath.length > 0,
    "extractEntities: filePath must be a non-empty string",
  );

  const lineStarts = buildLineIndex(text);
  const entities: Entity[] = [];

  for (const { kind, regex } of ENTITY_PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const name = match.groups?.name;
      if (!name || EXCLUDED_NAMES.has(name)) continue;
      const nameOffset = (match.index ?? 0) + match[0].length - name.length;
      entities.push({
        name,
        kind,
        visibility: parseVisibility(match.groups?.vis),
        module: filePath,
        line: lineAt(lineStarts, nameOffset),
      });
    }
  }

  entities.sort(
    (a, b) =>
      a.line - b.line ||
      (KIND_ORDER.get(a.kind) ?? 0) - (KIND_ORDER.get(b.kind) ?? 0),
  );

  attachDocs(text, entities);
  return entities;
}

/**
 * Canonical visibility of a raw qualifier. The most specific form wins:
 * `pub(in path)` > `pub(self)` > `pub(super)` > `pub(crate)` > `pub`.
 */
export function parseVisibility(raw: string | undefined): Visibility {
  if (!raw) return "private";
  const vis = raw.trim();
  if (/^pub\s*\(\s*in\s+/.test(vis)) return "pub(in ...)";
  if (/^pub\s*\(\s*self\s*\)/.test(vis)) return "pub(self)";
  if (/^pub\s*\(\s*super\s*\)/.test(vis)) return "pub(super)";
  if (/^pub\s*\(\s*crate\s*\)/.test(vis)) return "pub(crate)";
  if (vis.startsWith("pub")) return "pub";
  return "private";
}

// ─── Doc comments ────────────────────────────────────────────────────────────

export interface DocBlock {
  startLine: number;
  endLine: number;
  /** First line after the block that is not blank, an attribute or another doc line. */
  targetLine?: number;
  text: string;
}

/** Collect `///` runs and `/** … *\/` blocks, with the line each one documents. */
export function findDocBlocks(text: string): DocBlock[] {
  const lines = text.split("\n");
  const blocks: DocBlock[] = [];

  let i = 0;
  while (i < lines.length) {
    const trimmed = lines[i].trim();

    if (isLineDoc(trimmed)) {
      const start = i;
      const body: string[] = [];
      while (i < lines.length && isLineDoc(lines[i].trim())) {
        body.push(lines[i].trim().slice(3).trim());
        i++;
      }
      blocks.push(makeBlock(lines, start, i - 1, body));
      continue;
    }

    if (trimmed.startsWith("/**") && !trimmed.startsWith("/***") && !trimmed.startsWith("/**/")) {
      const start = i;
      const body: string[] = [];
      let end = i;
      while (end < lines.length) {
        const closing = lines[end].includes("*/", end === start ? lines[end].indexOf("/**") + 3 : 0);
        body.push(stripBlockLine(lines[end]));
        if (closing) break;
        end++;
      }
      if (end >= lines.length) break; // unterminated
      blocks.push(makeBlock(lines, start, end, body));
      i = end + 1;
      continue;
    }

    i++;
  }

  return blocks;
}

function attachDocs(text: string, entities: Entity[]): void {
  if (entities.length === 0) return;

  const byTarget = new Map<number, string>();
  for (const block of findDocBlocks(text)) {
    if (block.targetLine === undefined || !block.text) continue;
    if (block.targetLine - block.endLine > MAX_DOC_DISTANCE) continue;
    if (!byTarget.has(block.targetLine)) byTarget.set(block.targetLine, block.text);
  }

  for (const entity of entities) {
    const doc = byTarget.get(entity.line);
    if (doc) entity.doc = doc;
  }
}

function makeBlock(lines: string[], start: number, end: number, body: string[]): DocBlock {
  let target = end + 1;
  while (target < lines.length && isSkippableBeforeDeclaration(lines[target].trim())) {
    target++;
  }
  const joined = body.join("\n").trim();
  return {
    startLine: start + 1,
    endLine: end + 1,
    targetLine: target < lines.length ? target + 1 : undefined,
    text: joined.length > MAX_DOC_LENGTH ? joined.slice(0, MAX_DOC_LENGTH) : joined,
  };
}

function isLineDoc(trimmed: string): boolean {
  return trimmed.startsWith("///") && !trimmed.startsWith("////");
}

function isSkippableBeforeDeclaration(trimmed: string): boolean {
  return trimmed === "" || trimmed.startsWith("#[") || isLineDoc(trimmed);
}

function stripBlockLine(line: string): string {
  return line
    .trim()
    .replace(/^\/\*\*/, "")
    .replace(/\*\/$/, "")
    .replace(/^\*(?!\/)/, "")
    .trim();
}

// src/text-utils.ts — Small helpers shared by the lexical scanners

import { InvalidArgumentError } from "./types.js";

/**
 * Offsets at which each line starts. `lineAt` binary-searches this so that
 * converting many match offsets stays linear in practice.
 */
export function buildLineIndex(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

/** 1-based line number of a character offset. */
export function lineAt(lineStarts: number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

/** File name without directory or final extension: `src/net/tcp.rs` → `tcp`. */
export function fileStem(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? filePath;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

/** Trailing `::` segment of a Rust path: `crate::store::Db` → `Db`. */
export function lastPathSegment(path: string): string {
  const parts = path.split("::");
  return parts[parts.length - 1];
}

export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export function formatPercent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/**
 * Guard for the public operations: a missing text or path is a caller bug,
 * unlike unreadable files, which are only warnings.
 */
export function assertArgument(
  condition: boolean,
  message: string,
): asserts condition {
  if (!condition) throw new InvalidArgumentError(message);
}

// src/pattern-library.ts — Pattern library
// Joins detected design patterns with the catalogue's guidance: what the
// pattern is, when to reach for it, and which patterns travel with it.

import type { Detection, PatternLibraryEntry, Signature } from "./types.js";
import { formatPercent } from "./text-utils.js";
import { sortByConfidence } from "./pattern-detector.js";

const MAX_LIBRARY_EVIDENCE = 5;

/**
 * One entry per detection, most confident first. Guidance comes from the
 * signature of the same name; a detection without one gets empty guidance.
 */
export function buildPatternLibrary(
  detections: readonly Detection[],
  signatures: readonly Signature[],
): PatternLibraryEntry[] {
  const byName = new Map(signatures.map((s) => [s.name, s]));

  return sortByConfidence([...detections]).map((detection) => {
    const signature = byName.get(detection.name);
    return {
      name: detection.name,
      confidence: detection.confidence,
      evidence: detection.evidence.slice(0, MAX_LIBRARY_EVIDENCE),
      description: detection.description ?? signature?.description ?? "",
      whenToUse: signature?.usage ?? [],
      relatedPatterns: signature?.related ?? [],
    };
  });
}

export function formatPatternLibrary(entries: readonly PatternLibraryEntry[]): string {
  const lines: string[] = ["### Pattern Library", ""];
  if (entries.length === 0) {
    lines.push("_No design pattern detected._");
    return lines.join("\n");
  }

  const detected = new Set(entries.map((e) => e.name));
  for (const entry of entries) {
    lines.push(`#### ${entry.name} (${formatPercent(entry.confidence)})`, "");
    if (entry.description) lines.push(entry.description, "");
    if (entry.whenToUse.length > 0) {
      lines.push("When to use:", "", ...entry.whenToUse.map((use) => `- ${use}`), "");
    }
    if (entry.relatedPatterns.length > 0) {
      const related = entry.relatedPatterns.map((name) => (detected.has(name) ? `${name} (detected)` : name));
      lines.push(`Related patterns: ${related.join(", ")}`, "");
    }
  }

  while (lines[lines.length - 1] === "") lines.pop();
  return lines.join("\n");
}

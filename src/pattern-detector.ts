// src/pattern-detector.ts — Pattern Detector
// Weighted evidence scoring of named signatures against the aggregated source
// corpus and manifest text. Independent of the entity graph.

import type { Detection, EvidenceKind, EvidenceSpec, Signature, Warning } from "./types.js";
import { assertArgument } from "./text-utils.js";

/** Import evidence weighs 2, every other kind 1. */
export const EVIDENCE_WEIGHTS: Readonly<Record<EvidenceKind, number>> = {
  keyword: 1,
  import: 2,
  pattern: 1,
  trait: 1,
};

export const DEFAULT_PATTERN_THRESHOLD = 0.2;

export interface DetectOptions {
  /** Minimum confidence for a detection to be reported. */
  threshold?: number;
  warnings?: Warning[];
}

export interface SignatureScore {
  score: number;
  maxScore: number;
  confidence: number;
  evidence: string[];
}

/**
 * Score every signature and return those at or above the threshold, sorted by
 * confidence descending. Ties keep catalogue order.
 */
export function detectSignatures(
  corpus: string,
  manifest: string,
  signatures: readonly Signature[],
  options: DetectOptions = {},
): Detection[] {
  assertArgument(typeof corpus === "string", "detectSignatures: corpus must be a string");
  assertArgument(typeof manifest === "string", "detectSignatures: manifest must be a string");
  assertArgument(Array.isArray(signatures), "detectSignatures: signatures must be an array");

  const threshold = options.threshold ?? DEFAULT_PATTERN_THRESHOLD;
  const detected: Detection[] = [];

  for (const signature of signatures) {
    let result: SignatureScore;
    try {
      result = scoreSignature(corpus, manifest, signature);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      options.warnings?.push({
        level: "warn",
        module: "pattern-detector",
        message: `Signature "${signature.name}" could not be scored: ${msg}`,
      });
      continue;
    }

    if (result.score > 0 && result.confidence >= threshold) {
      const detection: Detection = {
        name: signature.name,
        confidence: result.confidence,
        evidence: result.evidence,
      };
      if (signature.description) detection.description = signature.description;
      detected.push(detection);
    }
  }

  return sortByConfidence(detected);
}

/**
 * Sum the weight of every evidence item found against the weight of every
 * item declared. A signature with no evidence scores 0/0 → confidence 0.
 */
export function scoreSignature(
  corpus: string,
  manifest: string,
  signature: Signature,
): SignatureScore {
  let score = 0;
  let maxScore = 0;
  const evidence: string[] = [];

  for (const item of signature.evidence ?? []) {
    const weight = EVIDENCE_WEIGHTS[item.kind];
    maxScore += weight;
    if (matchesEvidence(corpus, manifest, item)) {
      score += weight;
      evidence.push(describeEvidence(item));
    }
  }

  const confidence = maxScore > 0 ? Math.min(score / maxScore, 1) : 0;
  return { score, maxScore, confidence, evidence };
}

/** Stable sort, highest confidence first. */
export function sortByConfidence<T extends { confidence: number }>(items: T[]): T[] {
  return items.sort((a, b) => b.confidence - a.confidence);
}

function matchesEvidence(corpus: string, manifest: string, item: EvidenceSpec): boolean {
  switch (item.kind) {
    case "keyword":
    case "trait":
      return corpus.includes(item.value);
    case "import":
      return manifest.includes(item.value) || corpus.includes(`use ${item.value}`);
    case "pattern":
      return corpus.search(item.regex) !== -1;
  }
}

function describeEvidence(item: EvidenceSpec): string {
  if (item.kind === "pattern" && item.value.length > 30) {
    return `pattern: ${item.value.slice(0, 30)}...`;
  }
  return `${item.kind}: ${item.value}`;
}

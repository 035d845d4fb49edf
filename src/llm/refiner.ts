// src/llm/refiner.ts — Optional LLM confidence refinement
// Sends heuristic detections and their evidence to the model and takes back a
// confidence per category and name. The heuristic score is kept as
// originalConfidence.

import type { Detection, ResolvedConfig, Warning } from "../types.js";
import { callLLMWithRetry } from "./client.js";
import { sortByConfidence } from "../pattern-detector.js";

export interface RefineInput {
  project: string;
  architectureStyles: Detection[];
  designPatterns: Detection[];
}

export interface RefineResult {
  architectureStyles: Detection[];
  designPatterns: Detection[];
}

export type DetectionCategory = "style" | "pattern";

/** Refined confidences by category, then by detection name. */
export type ConfidenceScores = Record<DetectionCategory, Map<string, number>>;

const CATEGORIES: readonly DetectionCategory[] = ["style", "pattern"];

// One short JSON object per detection.
const REPLY_BASE_TOKENS = 128;
const REPLY_TOKENS_PER_DETECTION = 40;

const SYSTEM_PROMPT = `You review heuristic architecture detections for a Rust project.
Each detection lists the evidence that was matched in the source text.
Reply with ONLY a JSON array of objects
{"category": "style" | "pattern", "name": string, "confidence": number}
where confidence is between 0 and 1. Use the exact names and the category of
the section each detection was listed under.`;

/**
 * Refine detection confidences. Any failure (transport, malformed reply)
 * becomes a warning and the detections come back unchanged.
 */
export async function refineDetections(
  input: RefineInput,
  llmConfig: ResolvedConfig["llm"],
  warnings: Warning[] = [],
  retryDelayMs?: number,
): Promise<RefineResult> {
  const unchanged = {
    architectureStyles: input.architectureStyles,
    designPatterns: input.designPatterns,
  };
  const all = [...input.architectureStyles, ...input.designPatterns];
  if (all.length === 0) return unchanged;

  let reply: string;
  try {
    reply = await callLLMWithRetry(
      {
        system: SYSTEM_PROMPT,
        prompt: buildUserPrompt(input),
        maxTokens: REPLY_BASE_TOKENS + REPLY_TOKENS_PER_DETECTION * all.length,
      },
      llmConfig,
      retryDelayMs,
    );
  } catch (err) {
    warnings.push({
      level: "warn",
      module: "refiner",
      message: `Confidence refinement skipped for ${input.project}: ${err instanceof Error ? err.message : String(err)}`,
    });
    return unchanged;
  }

  const scores = parseConfidenceReply(reply);
  if (!scores) {
    warnings.push({
      level: "warn",
      module: "refiner",
      message: `Confidence refinement skipped for ${input.project}: reply did not contain a JSON array`,
    });
    return unchanged;
  }

  return {
    architectureStyles: applyScores(input.architectureStyles, scores.style),
    designPatterns: applyScores(input.designPatterns, scores.pattern),
  };
}

export function buildUserPrompt(input: RefineInput): string {
  const section = (title: string, category: DetectionCategory, detections: Detection[]) =>
    [
      `## ${title} (category "${category}")`,
      ...detections.map(
        (d) => `- ${d.name} (heuristic ${d.confidence.toFixed(2)}): ${d.evidence.join("; ") || "no evidence"}`,
      ),
    ].join("\n");

  return `<project>${input.project}</project>

<detections>
${section("Architecture styles", "style", input.architectureStyles)}

${section("Design patterns", "pattern", input.designPatterns)}
</detections>

Return the JSON array now.`;
}

/**
 * Pull the first JSON array out of the reply and keep the well-formed
 * entries. A name shared by a style and a pattern is scored per category.
 * Returns undefined when there is no parseable array.
 */
export function parseConfidenceReply(reply: string): ConfidenceScores | undefined {
  const start = reply.indexOf("[");
  const end = reply.lastIndexOf("]");
  if (start === -1 || end <= start) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(reply.slice(start, end + 1));
  } catch {
    return undefined;
  }
  if (!Array.isArray(parsed)) return undefined;

  const scores: ConfidenceScores = { style: new Map(), pattern: new Map() };
  for (const item of parsed) {
    if (typeof item !== "object" || item === null) continue;
    const category = CATEGORIES.find((c) => c === Reflect.get(item, "category"));
    const name: unknown = Reflect.get(item, "name");
    const confidence: unknown = Reflect.get(item, "confidence");
    if (!category || typeof name !== "string" || typeof confidence !== "number") continue;
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) continue;
    scores[category].set(name, confidence);
  }
  return scores;
}

function applyScores(detections: Detection[], scores: Map<string, number>): Detection[] {
  const refined = detections.map((d) => {
    const confidence = scores.get(d.name);
    if (confidence === undefined) return d;
    return { ...d, confidence, originalConfidence: d.confidence };
  });
  return sortByConfidence(refined);
}

import type { LineMetrics } from "./types.js";

export function countLines(text: string): Omit<LineMetrics, "files"> {
  const counts = { lines: 0, code: 0, comments: 0, blanks: 0 };
  if (text.length === 0) return counts;

  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    counts.lines++;
    if (!trimmed) counts.blanks++;
    else if (trimmed.startsWith("//") || trimmed.startsWith("/*")) counts.comments++;
    else counts.code++;
  }
  return counts;
}

export function aggregateLineMetrics(texts: readonly string[]): LineMetrics {
  const total: LineMetrics = { files: texts.length, lines: 0, code: 0, comments: 0, blanks: 0 };
  for (const text of texts) {
    const c = countLines(text);
    total.lines += c.lines;
    total.code += c.code;
    total.comments += c.comments;
    total.blanks += c.blanks;
  }
  return total;
}

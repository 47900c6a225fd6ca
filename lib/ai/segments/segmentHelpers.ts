import type { TranscriptLine } from "@/lib/types";

export function chunkArray<T>(arr: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size));
  }
  return chunks;
}

export function formatTranscript(lines: readonly TranscriptLine[]): string {
  return lines
    .map(s => `[${s.start} - ${s.end}] ${s.text}`)
    .join("\n");
}

// Replaces {{name}} placeholders
export function fillTemplate(
  template: string,
  values: Record<string, string | number>
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match
  );
}

export function stripCodeFences(text: string): string {
  return text
    .replace(/```json/gi, "")
    .replace(/```/g, "")
    .trim();
}

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

function tryParse(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : "JSON.parse failed" };
  }
}

/**
 * Parses model output that should be a JSON array. Code fences are removed
 * and, when the whole text does not parse, the slice between the first "["
 * and the last "]" is tried.
 */
export function parseJsonPayload(raw: string): JsonParseResult {
  const cleaned = stripCodeFences(raw);
  const whole = tryParse(cleaned);
  if (whole.ok) return whole;

  const start = cleaned.indexOf("[");
  const end = cleaned.lastIndexOf("]");

  if (start !== -1 && end > start) {
    const sliced = tryParse(cleaned.slice(start, end + 1));
    if (sliced.ok) return sliced;
  }

  return whole;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

import {
  DEFAULT_PLATFORMS,
  PLATFORMS,
  type Platform,
  type RejectedCandidate,
  type ValidatedSegment,
} from "@/lib/types";
import { isRecord, parseJsonPayload } from "./segmentHelpers";

/* -------------------------------------------------------------------------- */
/*                                   TYPES                                    */
/* -------------------------------------------------------------------------- */

export type ParseOutcome =
  | {
      kind: "ok";
      discovered: number;
      segments: ValidatedSegment[];
      rejected: RejectedCandidate[];
      droppedPlatforms: string[];
    }
  // MalformedResponse
  | { kind: "parse_error"; reason: string }
  // SchemaViolation
  | { kind: "schema_error"; reason: string };

type CandidateCheck =
  | { ok: true; segment: ValidatedSegment; droppedPlatforms: string[] }
  | { ok: false; reason: string };

/* -------------------------------------------------------------------------- */
/*                                FIELD ALIASES                               */
/* -------------------------------------------------------------------------- */

// Older prompts answered with start_time / end_time / yt_title
const REQUIRED_FIELDS = {
  start: ["start", "start_time"],
  end: ["end", "end_time"],
  title: ["title", "yt_title"],
} as const;

function pick(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (Object.prototype.hasOwnProperty.call(record, key)) return record[key];
  }
  return undefined;
}

function hasAny(record: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.some((key) => Object.prototype.hasOwnProperty.call(record, key));
}

/* -------------------------------------------------------------------------- */
/*                              FIELD COERCION                                */
/* -------------------------------------------------------------------------- */

/**
 * Accepts numbers, numeric strings ("12.5", "12.5s") and clock strings
 * ("1:05", "01:02:03.5").
 */
export function coerceSeconds(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string") return undefined;

  const text = value.trim().replace(/s$/i, "").trim();

  if (/^-?\d+(?:\.\d+)?$/.test(text)) {
    return Number(text);
  }

  if (/^\d+(?::\d{1,2})?:\d{1,2}(?:\.\d+)?$/.test(text)) {
    return text
      .split(":")
      .map(Number)
      .reduce((total, part) => total * 60 + part, 0);
  }

  return undefined;
}

function coerceText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function toList(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) return value;
  if (typeof value === "string") return value.split(",");
  return undefined;
}

const platformKey = (name: string) => name.toLowerCase().replace(/[\s_\-]+/g, "");

const PLATFORM_LOOKUP = new Map<string, Platform>([
  ...PLATFORMS.map((p): [string, Platform] => [platformKey(p), p]),
  ["youtube", "YouTube_Shorts"],
  ["shorts", "YouTube_Shorts"],
  ["instagram", "Instagram_Reels"],
  ["reels", "Instagram_Reels"],
]);

/**
 * Maps model-provided platform names onto the known set. Unknown names are
 * returned separately so the caller can log them; the result keeps the
 * canonical platform order.
 */
export function normalizePlatforms(value: unknown): {
  platforms: Platform[];
  dropped: string[];
} {
  const list = toList(value);
  if (!list) return { platforms: [...DEFAULT_PLATFORMS], dropped: [] };

  const found = new Set<Platform>();
  const dropped: string[] = [];

  for (const item of list) {
    const name = typeof item === "string" ? item.trim() : "";
    const platform = name ? PLATFORM_LOOKUP.get(platformKey(name)) : undefined;

    if (platform) found.add(platform);
    else dropped.push(String(item));
  }

  return {
    platforms: PLATFORMS.filter((p) => found.has(p)),
    dropped,
  };
}

export function normalizeHashtags(value: unknown): string[] {
  const list = toList(value) ?? [];
  const seen = new Set<string>();

  for (const item of list) {
    if (typeof item !== "string") continue;
    const tag = item.trim().replace(/^#+/, "").trim();
    if (!tag) continue;
    seen.add(`#${tag}`);
  }

  return [...seen];
}

/* -------------------------------------------------------------------------- */
/*                           CANDIDATE VALIDATION                             */
/* -------------------------------------------------------------------------- */

export function validateCandidate(
  record: Record<string, unknown>,
  duration: number
): CandidateCheck {
  const start = coerceSeconds(pick(record, REQUIRED_FIELDS.start));
  const end = coerceSeconds(pick(record, REQUIRED_FIELDS.end));

  if (start === undefined) return { ok: false, reason: "start is not a number" };
  if (end === undefined) return { ok: false, reason: "end is not a number" };
  if (start < 0) return { ok: false, reason: `start ${start} is negative` };
  if (start >= end) {
    return { ok: false, reason: `start ${start} is not before end ${end}` };
  }
  if (end > duration) {
    return { ok: false, reason: `end ${end} exceeds media duration ${duration}` };
  }

  const title = coerceText(pick(record, REQUIRED_FIELDS.title));
  if (!title) return { ok: false, reason: "title is empty" };

  const hook = coerceText(record.hook);
  const description = coerceText(record.description) || hook || title;
  const { platforms, dropped } = normalizePlatforms(record.platforms);

  const segment: ValidatedSegment = Object.freeze({
    start,
    end,
    title,
    hook,
    description,
    platforms: Object.freeze(platforms),
    hashtags: Object.freeze(normalizeHashtags(record.hashtags)),
  });

  return { ok: true, segment, droppedPlatforms: dropped };
}

/* -------------------------------------------------------------------------- */
/*                               RESPONSE PARSE                               */
/* -------------------------------------------------------------------------- */

export function parseSegmentResponse(raw: string, duration: number): ParseOutcome {
  const parsed = parseJsonPayload(raw);
  if (!parsed.ok) {
    return { kind: "parse_error", reason: parsed.error };
  }

  const payload = parsed.value;
  if (!Array.isArray(payload)) {
    return { kind: "schema_error", reason: "Response is not a JSON array" };
  }

  const records: Record<string, unknown>[] = [];

  for (let i = 0; i < payload.length; i++) {
    const item: unknown = payload[i];

    if (!isRecord(item)) {
      return { kind: "schema_error", reason: `Element ${i} is not an object` };
    }

    const missing = Object.entries(REQUIRED_FIELDS)
      .filter(([, aliases]) => !hasAny(item, aliases))
      .map(([field]) => field);

    if (missing.length > 0) {
      return {
        kind: "schema_error",
        reason: `Element ${i} is missing ${missing.join(", ")}`,
      };
    }

    records.push(item);
  }

  const segments: ValidatedSegment[] = [];
  const rejected: RejectedCandidate[] = [];
  const droppedPlatforms: string[] = [];

  records.forEach((record, index) => {
    const check = validateCandidate(record, duration);
    if (check.ok) {
      segments.push(check.segment);
      droppedPlatforms.push(...check.droppedPlatforms);
    } else {
      rejected.push({ index, reason: check.reason });
    }
  });

  return {
    kind: "ok",
    discovered: payload.length,
    segments,
    rejected,
    droppedPlatforms,
  };
}

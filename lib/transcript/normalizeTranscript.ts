import { NoTranscriptAvailableError, errorMessage } from "@/lib/errors";
import type {
  NormalizedTranscript,
  TranscriptLine,
  TranscriptSourceInfo,
} from "@/lib/types";
import { createLogger } from "@/lib/utils/logger";
import type { TrackInfo, TranscriptSource } from "./transcriptSource";

const log = createLogger("TRANSCRIPT");

type NormalizeOptions = {
  targetLanguage?: string;
};

type TrackPlan = {
  track: TrackInfo;
  translate: boolean;
};

// "en", "en-US" and "en_GB" all count as English
export function matchesLanguage(code: string, target: string): boolean {
  const a = code.toLowerCase().replace("_", "-");
  const b = target.toLowerCase();
  return a === b || a.startsWith(`${b}-`);
}

export function describeSource(info: TranscriptSourceInfo): string {
  const kind = info.isAuto ? "auto-generated" : "manual";
  if (info.translatedFrom) {
    return `${info.translatedFrom} (${kind}, translated to ${info.language})`;
  }
  return `${info.language} (${kind})`;
}

/**
 * Order in which tracks are tried: target-language manual, target-language
 * auto, then every other track (manual first) through translation.
 */
export function planTracks(tracks: TrackInfo[], targetLanguage: string): TrackPlan[] {
  const native = tracks.filter((t) => matchesLanguage(t.language, targetLanguage));
  const foreign = tracks.filter((t) => !matchesLanguage(t.language, targetLanguage));
  const manualFirst = (list: TrackInfo[]) => [
    ...list.filter((t) => !t.isAuto),
    ...list.filter((t) => t.isAuto),
  ];

  return [
    ...manualFirst(native).map((track) => ({ track, translate: false })),
    ...manualFirst(foreign).map((track) => ({ track, translate: true })),
  ];
}

/**
 * Drops lines without a usable start or text, pins a missing/inverted end to
 * the start and orders by start. Timings are otherwise left untouched.
 */
export function standardizeLines(
  lines: readonly TranscriptLine[],
  language: string
): TranscriptLine[] {
  const kept: TranscriptLine[] = [];

  for (const line of lines) {
    if (typeof line.start !== "number" || !Number.isFinite(line.start)) continue;
    if (typeof line.text !== "string") continue;

    const text = line.text.replace(/\s+/g, " ").trim();
    if (!text) continue;

    const end =
      typeof line.end === "number" && Number.isFinite(line.end) && line.end >= line.start
        ? line.end
        : line.start;

    kept.push(Object.freeze({ start: line.start, end, text, language }));
  }

  // Array#sort is stable, equal starts keep source order
  return kept.sort((a, b) => a.start - b.start);
}

export async function normalizeTranscript(
  source: TranscriptSource,
  mediaId: string,
  options: NormalizeOptions = {}
): Promise<NormalizedTranscript> {
  const targetLanguage = options.targetLanguage ?? "en";

  const tracks = await source.listTracks(mediaId);
  log.step("Available tracks", { mediaId, tracks });

  if (tracks.length === 0) {
    throw new NoTranscriptAvailableError(mediaId);
  }

  let lastError: unknown;

  for (const { track, translate } of planTracks(tracks, targetLanguage)) {
    const label = `${track.language} (${track.isAuto ? "auto" : "manual"})`;

    try {
      const raw = await source.getTrack(mediaId, track.language, track.isAuto);
      const fetched = translate
        ? await source.translate(raw, targetLanguage)
        : raw;

      const lines = standardizeLines(fetched, targetLanguage);
      if (lines.length === 0) {
        log.warn(`Track ${label} produced no usable lines, trying next`);
        continue;
      }

      const info: TranscriptSourceInfo = {
        language: targetLanguage,
        isAuto: track.isAuto,
        ...(translate ? { translatedFrom: track.language } : {}),
      };

      log.step("Transcript normalized", {
        source: describeSource(info),
        lines: lines.length,
      });

      return { lines, source: info };
    } catch (err) {
      lastError = err;
      log.error(`Track ${label} failed: ${errorMessage(err)}`, err);
    }
  }

  throw new NoTranscriptAvailableError(mediaId, lastError);
}

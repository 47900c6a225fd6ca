import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { TranscriptLine } from "@/lib/types";
import { createLogger } from "@/lib/utils/logger";
import type {
  TrackInfo,
  TranscriptSource,
  TranscriptTranslator,
} from "./transcriptSource";

// Numbers or numeric strings; null and blanks are not zero
const seconds = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(?:\.\d+)?$/)
    .transform(Number),
]);

const captionLineSchema = z.object({
  start: seconds,
  end: seconds.optional(),
  duration: seconds.optional(),
  text: z.string(),
});

// Each line is validated on its own
const captionFileSchema = z.array(z.unknown());

const log = createLogger("CAPTIONS");

const AUTO_SUFFIX = ".auto";

function trackFileName(mediaId: string, language: string, isAuto: boolean): string {
  return `${mediaId}.${language}${isAuto ? AUTO_SUFFIX : ""}.json`;
}

/**
 * Caption tracks stored on disk, one JSON file per track:
 *
 *   <mediaId>.<lang>.json       manually created
 *   <mediaId>.<lang>.auto.json  auto-generated
 *
 * Each file holds `[{ start, end | duration, text }]`.
 */
export function createJsonCaptionSource(
  captionsDir: string,
  translator?: TranscriptTranslator
): TranscriptSource {
  return {
    async listTracks(mediaId) {
      let files: string[];
      try {
        files = await fs.readdir(captionsDir);
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
        throw err;
      }

      const prefix = `${mediaId}.`;

      return files
        .filter((f) => f.startsWith(prefix) && f.endsWith(".json"))
        .sort()
        .map((f): TrackInfo => {
          const tag = f.slice(prefix.length, -".json".length);
          const isAuto = tag.endsWith(AUTO_SUFFIX);
          return {
            language: isAuto ? tag.slice(0, -AUTO_SUFFIX.length) : tag,
            isAuto,
          };
        })
        .filter((t) => t.language.length > 0);
    },

    async getTrack(mediaId, language, isAuto = false) {
      const file = path.join(captionsDir, trackFileName(mediaId, language, isAuto));
      const raw: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
      const parsed = captionFileSchema.safeParse(raw);

      if (!parsed.success) {
        throw new Error(`Invalid caption file ${file}: ${parsed.error.message}`);
      }

      const lines: TranscriptLine[] = [];

      parsed.data.forEach((item, index) => {
        const line = captionLineSchema.safeParse(item);
        if (!line.success) {
          log.warn(`Skipping caption line ${index} in ${file}`, line.error.issues);
          return;
        }

        lines.push({
          start: line.data.start,
          end: line.data.end ?? line.data.start + (line.data.duration ?? 0),
          text: line.data.text,
          language,
        });
      });

      return lines;
    },

    async translate(track, targetLanguage) {
      if (!translator) {
        throw new Error(`No translator configured for ${targetLanguage}`);
      }
      return translator(track, targetLanguage);
    },
  };
}

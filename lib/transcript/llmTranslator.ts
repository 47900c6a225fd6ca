import type { CompletionClient } from "@/lib/ai/completionClient";
import { TRANSLATION_INSTRUCTIONS } from "@/lib/ai/prompts/segment.system";
import {
  chunkArray,
  fillTemplate,
  parseJsonPayload,
} from "@/lib/ai/segments/segmentHelpers";
import type { TranscriptLine } from "@/lib/types";
import { createLogger } from "@/lib/utils/logger";
import type { TranscriptTranslator } from "./transcriptSource";

const LINES_PER_REQUEST = 40;

const log = createLogger("TRANSLATE");

/**
 * Translates caption text through the completion client, a batch of lines
 * per request. Timings are carried over from the source lines untouched.
 */
export function createLlmTranslator(
  client: CompletionClient,
  linesPerRequest = LINES_PER_REQUEST
): TranscriptTranslator {
  return async (track, targetLanguage) => {
    const batches = chunkArray(track, linesPerRequest);
    const translated: TranscriptLine[] = [];

    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i];
      log.step(`Translating batch ${i + 1}/${batches.length}`, {
        lines: batch.length,
        targetLanguage,
      });

      const prompt = [
        fillTemplate(TRANSLATION_INSTRUCTIONS, {
          language: targetLanguage,
          count: batch.length,
        }).trim(),
        JSON.stringify(batch.map((line) => line.text), null, 2),
      ].join("\n\n");

      const raw = await client.complete(prompt);
      const parsed = parseJsonPayload(raw);
      const items: unknown[] = parsed.ok && Array.isArray(parsed.value) ? parsed.value : [];
      const texts = items.filter((text): text is string => typeof text === "string");

      // One translated string per source line
      if (items.length !== batch.length || texts.length !== batch.length) {
        log.error(`Translation batch ${i + 1} unusable`, "wrong shape", raw);
        throw new Error(`Translation batch ${i + 1} returned an unusable response`);
      }

      batch.forEach((line, j) => {
        translated.push({
          start: line.start,
          end: line.end,
          text: texts[j],
          language: targetLanguage,
        });
      });
    }

    return translated;
  };
}

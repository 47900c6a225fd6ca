import type { CompletionClient } from "@/lib/ai/completionClient";
import { SEGMENT_INSTRUCTIONS } from "@/lib/ai/prompts/segment.system";
import { errorMessage } from "@/lib/errors";
import {
  PLATFORMS,
  type RejectedCandidate,
  type TranscriptLine,
  type ValidatedSegment,
} from "@/lib/types";
import { createLogger } from "@/lib/utils/logger";
import { wait } from "@/lib/utils/wait";
import { parseSegmentResponse } from "./parseSegmentResponse";
import { fillTemplate, formatTranscript } from "./segmentHelpers";

/* -------------------------------------------------------------------------- */
/*                                   TYPES                                    */
/* -------------------------------------------------------------------------- */

export type ExtractionInput = {
  transcript: readonly TranscriptLine[];
  duration: number;
};

export type ExtractionOptions = {
  client: CompletionClient;
  maxAttempts?: number;
  baseDelayMs?: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type ExtractionResult =
  | {
      status: "ok";
      attempts: number;
      discovered: number;
      segments: ValidatedSegment[];
      rejected: RejectedCandidate[];
    }
  | {
      status: "ExtractionExhausted";
      attempts: number;
      discovered: 0;
      segments: [];
      rejected: [];
      failures: string[];
    };

/* -------------------------------------------------------------------------- */
/*                                CONFIGURATION                               */
/* -------------------------------------------------------------------------- */

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 2000;

const log = createLogger("SEGMENTS");

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export function buildSegmentPrompt({ transcript, duration }: ExtractionInput): string {
  const instructions = fillTemplate(SEGMENT_INSTRUCTIONS, {
    duration,
    platforms: PLATFORMS.join(", "),
  }).trim();

  return [
    instructions,
    `Video duration: ${duration} seconds`,
    "Here is the transcript ([start - end] text, in seconds):",
    formatTranscript(transcript),
  ].join("\n\n");
}

/* -------------------------------------------------------------------------- */
/*                              MAIN ENTRY POINT                              */
/* -------------------------------------------------------------------------- */

/**
 * Asks the model for clip segments and validates the answer.
 *
 * Only a response that cannot be used at all (unparseable, not an array,
 * elements missing required keys, or a failed request) is retried, with
 * exponential backoff and one request in flight at a time. Individual bad
 * elements are rejected and counted instead. When every attempt fails the
 * result is `ExtractionExhausted` with no segments.
 */
export async function extractSegments(
  input: ExtractionInput,
  {
    client,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    signal,
    sleep = wait,
  }: ExtractionOptions
): Promise<ExtractionResult> {
  const prompt = buildSegmentPrompt(input);
  const failures: string[] = [];
  let attempts = 0;

  log.step("Extracting segments", {
    lines: input.transcript.length,
    duration: input.duration,
    maxAttempts,
  });

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      failures.push("Aborted before attempt " + attempt);
      break;
    }

    attempts = attempt;
    log.step(`Segment LLM call (attempt ${attempt}/${maxAttempts})`);

    let raw: string | undefined;

    try {
      raw = await client.complete(prompt);
    } catch (err) {
      failures.push(`RequestFailed: ${errorMessage(err)}`);
      log.error(`LLM request failed (attempt ${attempt})`, err);
    }

    if (raw !== undefined) {
      const outcome = parseSegmentResponse(raw, input.duration);

      if (outcome.kind === "ok") {
        for (const rejection of outcome.rejected) {
          log.warn(`Candidate ${rejection.index} rejected`, rejection.reason);
        }
        if (outcome.droppedPlatforms.length > 0) {
          log.warn("Dropped unknown platforms", outcome.droppedPlatforms);
        }

        log.step("Segments validated", {
          discovered: outcome.discovered,
          validated: outcome.segments.length,
          rejected: outcome.rejected.length,
        });

        return {
          status: "ok",
          attempts,
          discovered: outcome.discovered,
          segments: outcome.segments,
          rejected: outcome.rejected,
        };
      }

      const label = outcome.kind === "parse_error" ? "MalformedResponse" : "SchemaViolation";
      failures.push(`${label}: ${outcome.reason}`);
      log.error(`${label} (attempt ${attempt})`, outcome.reason, raw);
    }

    if (attempt < maxAttempts) {
      const delay = backoffDelay(attempt, baseDelayMs);
      log.step(`Retrying in ${delay}ms`);

      try {
        await sleep(delay, signal);
      } catch (err) {
        failures.push(`Aborted during backoff: ${errorMessage(err)}`);
        break;
      }
    }
  }

  log.error("Segment extraction exhausted", failures.at(-1) ?? "no attempts made");

  return {
    status: "ExtractionExhausted",
    attempts,
    discovered: 0,
    segments: [],
    rejected: [],
    failures,
  };
}

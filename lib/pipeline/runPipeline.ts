import path from "path";
import type { CompletionClient } from "@/lib/ai/completionClient";
import { extractSegments } from "@/lib/ai/segments/extractSegments";
import { cutClips, type CutPrimitive } from "@/lib/clips/cutClips";
import { ExtractionExhaustedError, errorMessage } from "@/lib/errors";
import { groupPaths, organizeOutput } from "@/lib/output/organizeOutput";
import {
  describeSource,
  normalizeTranscript,
} from "@/lib/transcript/normalizeTranscript";
import type { TranscriptSource } from "@/lib/transcript/transcriptSource";
import {
  mapPlatforms,
  type ClipArtifact,
  type MediaHandle,
  type NormalizedTranscript,
  type PipelineState,
  type RunReport,
  type ValidatedSegment,
} from "@/lib/types";
import { safeRunName } from "@/lib/utils/fileNames";
import { createLogger } from "@/lib/utils/logger";

/* -------------------------------------------------------------------------- */
/*                                   TYPES                                    */
/* -------------------------------------------------------------------------- */

export type PipelineDeps = {
  transcripts: TranscriptSource;
  llm: CompletionClient;
  cut: CutPrimitive;
};

export type PipelineOptions = {
  outputDir: string;
  runName?: string;
  targetLanguage?: string;
  cutConcurrency?: number;
  extraction?: {
    maxAttempts?: number;
    baseDelayMs?: number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  };
  signal?: AbortSignal;
  onStateChange?: (state: PipelineState, report: RunReport) => void | Promise<void>;
};

const log = createLogger("PIPELINE");

export function createReport(mediaId: string): RunReport {
  return {
    mediaId,
    status: "succeeded",
    state: "Init",
    history: ["Init"],
    stages: {
      transcript: "pending",
      extraction: "pending",
      cutting: "pending",
      organizing: "pending",
    },
    counts: {
      transcriptLines: 0,
      discovered: 0,
      validated: 0,
      rejected: 0,
      cut: 0,
      failed: 0,
    },
    errors: [],
    outputs: { platforms: mapPlatforms((): string[] => []) },
  };
}

/* -------------------------------------------------------------------------- */
/*                              MAIN ENTRY POINT                              */
/* -------------------------------------------------------------------------- */

/**
 * Transcript → segments → clips → organized output, always resolving with a
 * RunReport.
 *
 * No transcript moves the run to `Failed` and skips every later stage.
 * Extraction exhaustion lets the remaining stages run on zero segments and
 * marks the run failed. Everything else (rejected candidates, failed cuts,
 * link or record errors) only adds entries to `report.errors`.
 */
export async function runPipeline(
  media: MediaHandle,
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<RunReport> {
  const report = createReport(media.mediaId);
  const runName = safeRunName(options.runName ?? media.mediaId);
  const runDir = path.join(options.outputDir, runName);

  const transition = async (state: PipelineState) => {
    report.state = state;
    report.history.push(state);
    log.step(`State → ${state}`, { mediaId: media.mediaId });

    try {
      await options.onStateChange?.(state, report);
    } catch (err) {
      log.error(`State listener failed on ${state}`, err);
    }
  };

  /* ------------------------------ transcript ------------------------------ */

  await transition("TranscriptFetching");

  let transcript: NormalizedTranscript;

  try {
    transcript = await normalizeTranscript(deps.transcripts, media.mediaId, {
      targetLanguage: options.targetLanguage,
    });
    report.stages.transcript = "ok";
    report.transcriptSource = describeSource(transcript.source);
    report.counts.transcriptLines = transcript.lines.length;
  } catch (err) {
    log.error("Transcript stage failed", err);
    report.stages.transcript = "NoTranscriptAvailable";
    report.stages.extraction = "skipped";
    report.stages.cutting = "skipped";
    report.stages.organizing = "skipped";
    report.errors.push({
      stage: "transcript",
      code: "NoTranscriptAvailable",
      message: errorMessage(err),
    });
    report.status = "failed";
    await transition("Failed");
    return report;
  }

  /* ------------------------------ extraction ------------------------------ */

  await transition("SegmentExtraction");

  let segments: ValidatedSegment[] = [];
  let exhausted = false;

  try {
    const result = await extractSegments(
      { transcript: transcript.lines, duration: media.duration },
      { client: deps.llm, ...options.extraction, signal: options.signal }
    );

    if (result.status === "ok") {
      segments = result.segments;
      report.counts.discovered = result.discovered;
      report.counts.validated = result.segments.length;
      report.counts.rejected = result.rejected.length;
      report.stages.extraction = result.rejected.length > 0 ? "degraded" : "ok";

      for (const rejection of result.rejected) {
        report.errors.push({
          stage: "extraction",
          code: "ValidationRejected",
          message: rejection.reason,
          index: rejection.index,
        });
      }
    } else {
      exhausted = true;
      const error = new ExtractionExhaustedError(result.attempts, result.failures);
      report.stages.extraction = "ExtractionExhausted";
      report.errors.push({ stage: "extraction", code: error.code, message: error.message });
    }
  } catch (err) {
    log.error("Extraction stage crashed", err);
    exhausted = true;
    report.stages.extraction = "ExtractionExhausted";
    report.errors.push({
      stage: "extraction",
      code: "ExtractionExhausted",
      message: errorMessage(err),
    });
  }

  /* ------------------------------- cutting -------------------------------- */

  await transition("ClipCutting");

  let artifacts: ClipArtifact[];

  try {
    artifacts = await cutClips(media, segments, {
      cut: deps.cut,
      outputDir: path.join(runDir, "clips"),
      concurrency: options.cutConcurrency,
    });
  } catch (err) {
    log.error("Cutting stage crashed", err);
    const message = errorMessage(err);
    artifacts = segments.map((segment, index): ClipArtifact => ({
      index,
      segment,
      outputPath: "",
      status: "Failed",
      error: message,
    }));
  }

  for (const artifact of artifacts) {
    if (artifact.status === "Cut") {
      report.counts.cut++;
      continue;
    }
    report.counts.failed++;
    report.errors.push({
      stage: "cutting",
      code: "CutError",
      message: artifact.error ?? "Unknown error",
      index: artifact.index,
    });
  }

  if (segments.length === 0) report.stages.cutting = "skipped";
  else report.stages.cutting = report.counts.failed > 0 ? "degraded" : "ok";

  /* ------------------------------ organizing ------------------------------ */

  await transition("Organizing");

  const organized = await organizeOutput(artifacts, { outputDir: runDir, runName });
  report.errors.push(...organized.errors);
  report.stages.organizing = organized.errors.length > 0 ? "degraded" : "ok";
  report.outputs = {
    jsonPath: organized.jsonPath,
    textPath: organized.textPath,
    platforms: groupPaths(organized.groups),
  };

  if (exhausted) report.status = "failed";

  await transition("Done");

  log.step("Run complete", {
    mediaId: media.mediaId,
    status: report.status,
    counts: report.counts,
    errors: report.errors.length,
  });

  return report;
}

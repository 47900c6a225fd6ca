import { TRANSLATION_TEMPERATURE } from "@/lib/ai/config";
import { createCompletionClient } from "@/lib/ai/completionClient";
import { createFfmpegCutter } from "@/lib/clips/ffmpegCutter";
import type { AppConfig } from "@/lib/config";
import { DownloadError } from "@/lib/errors";
import { probeMedia, type MediaFetcher } from "@/lib/media/probeMedia";
import { runPipeline, type PipelineDeps } from "@/lib/pipeline/runPipeline";
import type { ClipJobData } from "@/lib/queue/clips.queue";
import { createJsonCaptionSource } from "@/lib/transcript/jsonCaptionSource";
import { createLlmTranslator } from "@/lib/transcript/llmTranslator";
import type { MediaHandle, RunReport } from "@/lib/types";
import { createLogger } from "@/lib/utils/logger";

// The parts of a BullMQ Job the processor touches
export type ClipJobHandle = {
  id?: string;
  data: ClipJobData;
  updateProgress(progress: number | object): Promise<void>;
};

export type ClipJobContext = {
  config: AppConfig;
  pipeline: PipelineDeps;
  probe?: (videoPath: string, mediaId?: string) => Promise<MediaHandle>;
  fetcher?: MediaFetcher;
};

const log = createLogger("CLIPS JOB");

export function buildPipelineDeps(config: AppConfig): PipelineDeps {
  const translator = createLlmTranslator(
    createCompletionClient(config.llm, TRANSLATION_TEMPERATURE)
  );

  return {
    transcripts: createJsonCaptionSource(config.captionsDir, translator),
    llm: createCompletionClient(config.llm),
    cut: createFfmpegCutter({ format: config.clipFormat }),
  };
}

export async function resolveMedia(
  data: ClipJobData,
  { probe = probeMedia, fetcher }: Pick<ClipJobContext, "probe" | "fetcher">
): Promise<MediaHandle> {
  if (data.mediaPath) {
    return probe(data.mediaPath, data.mediaId);
  }

  if (data.mediaUrl) {
    if (!fetcher) {
      throw new DownloadError(`No media fetcher configured for ${data.mediaUrl}`);
    }
    return fetcher.fetch(data.mediaUrl);
  }

  throw new Error("Job data has neither mediaPath nor mediaUrl");
}

export async function processClipJob(
  job: ClipJobHandle,
  context: ClipJobContext
): Promise<RunReport> {
  const { config } = context;

  log.step(`Processing job ${job.id ?? "(no id)"}`, job.data);

  const media = await resolveMedia(job.data, context);

  const report = await runPipeline(media, context.pipeline, {
    outputDir: config.clipsDir,
    runName: job.data.runName,
    targetLanguage: config.transcriptLanguage,
    cutConcurrency: config.cutConcurrency,
    extraction: config.extraction,
    onStateChange: (state) => job.updateProgress({ state, mediaId: media.mediaId }),
  });

  if (report.status === "failed") {
    log.error(`Run for ${media.mediaId} failed`, report.errors.at(0)?.message ?? "unknown");
  } else {
    log.step(`Run for ${media.mediaId} succeeded`, report.counts);
  }

  return report;
}

import fs from "fs/promises";
import os from "os";
import path from "path";
import { errorMessage } from "@/lib/errors";
import type { ClipArtifact, MediaHandle, ValidatedSegment } from "@/lib/types";
import { slugify } from "@/lib/utils/fileNames";
import { createLogger } from "@/lib/utils/logger";
import { mapWithConcurrency } from "@/lib/utils/pool";

export type CutRequest = {
  inputPath: string;
  start: number;
  end: number;
  outputPath: string;
};

// Produces the sub-clip and resolves with the path it was written to
export type CutPrimitive = (request: CutRequest) => Promise<string>;

type CutClipsOptions = {
  cut: CutPrimitive;
  outputDir: string;
  concurrency?: number;
  extension?: string;
};

const log = createLogger("CLIPS");

// `<NN>_<slug>.mp4` per segment, NN being the 1-based position
export function clipFileNames(
  segments: readonly ValidatedSegment[],
  extension = ".mp4"
): string[] {
  const width = Math.max(2, String(segments.length).length);

  return segments.map((segment, i) => {
    const position = String(i + 1).padStart(width, "0");
    return `${position}_${slugify(segment.title) || "clip"}${extension}`;
  });
}

// Drops whatever an earlier run left at this path
async function removeStaleClip(outputPath: string): Promise<void> {
  try {
    await fs.rm(outputPath, { force: true });
  } catch (err) {
    log.error(`Could not remove stale clip ${outputPath}`, err);
  }
}

/**
 * Cuts one clip per segment. A failing segment becomes a `Failed` artifact
 * and never stops the rest of the batch; the result always has one artifact
 * per segment, in segment order.
 */
export async function cutClips(
  media: MediaHandle,
  segments: readonly ValidatedSegment[],
  {
    cut,
    outputDir,
    concurrency = os.availableParallelism(),
    extension = ".mp4",
  }: CutClipsOptions
): Promise<ClipArtifact[]> {
  if (segments.length === 0) {
    log.step("No segments to cut");
    return [];
  }

  const names = clipFileNames(segments, extension);
  log.step(`Processing ${segments.length} segments...`, { concurrency });

  const artifacts = await mapWithConcurrency(
    segments,
    concurrency,
    async (segment, index): Promise<ClipArtifact> => {
      const label = `Segment ${index + 1}/${segments.length} (${segment.title})`;
      const outputPath = path.join(outputDir, names[index]);

      try {
        const written = await cut({
          inputPath: media.path,
          start: segment.start,
          end: segment.end,
          outputPath,
        });

        log.step(`${label}: cut`, written);
        const artifact: ClipArtifact = {
          index,
          segment,
          outputPath: written,
          status: "Cut",
        };
        return Object.freeze(artifact);
      } catch (err) {
        log.error(`${label}: failed`, err);
        await removeStaleClip(outputPath);
        const artifact: ClipArtifact = {
          index,
          segment,
          outputPath,
          status: "Failed",
          error: errorMessage(err),
        };
        return Object.freeze(artifact);
      }
    }
  );

  const cutCount = artifacts.filter((a) => a.status === "Cut").length;
  log.step(`Clip generation complete: ${cutCount}/${segments.length} successful`);

  return artifacts;
}

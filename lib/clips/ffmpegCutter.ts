import { exec } from "child_process";
import fs from "fs/promises";
import path from "path";
import { CutError } from "@/lib/errors";
import { createFileLogger } from "@/lib/utils/logger";
import type { CutPrimitive, CutRequest } from "./cutClips";

export const CLIP_FORMATS = ["source", "vertical_9_16", "horizontal_16_9"] as const;

export type ClipFormat = (typeof CLIP_FORMATS)[number];

type FfmpegCutterOptions = {
  format?: ClipFormat;
  ffmpegPath?: string;
  logDir?: string;
};

const VIDEO_FILTERS: Record<ClipFormat, string | undefined> = {
  source: undefined,
  vertical_9_16: "crop=ih*9/16:ih:(iw-ih*9/16)/2:0,scale=1080:1920",
  horizontal_16_9:
    "scale=1920:1080:force_original_aspect_ratio=decrease,pad=1920:1080:(ow-iw)/2:(oh-ih)/2",
};

function quote(value: string): string {
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}

export function buildFfmpegCommand(
  { inputPath, start, end, outputPath }: CutRequest,
  format: ClipFormat = "source",
  ffmpegPath = "ffmpeg"
): string {
  const filter = VIDEO_FILTERS[format];

  //IMPORTANT: limit ffmpeg log spam
  return [
    ffmpegPath,
    "-y -loglevel error",
    `-ss ${start}`,
    `-i ${quote(inputPath)}`,
    `-t ${end - start}`,
    filter ? `-vf ${quote(filter)}` : undefined,
    "-c:v libx264 -preset fast -crf 23 -c:a aac -b:a 128k",
    quote(outputPath),
  ]
    .filter((part): part is string => Boolean(part))
    .join(" ");
}

/**
 * Cut primitive backed by a local ffmpeg binary. Rejects with `CutError`
 * when the input is missing, ffmpeg exits non-zero, or the output is empty.
 */
export function createFfmpegCutter({
  format = "source",
  ffmpegPath = "ffmpeg",
  logDir,
}: FfmpegCutterOptions = {}): CutPrimitive {
  const log = createFileLogger("ffmpeg", logDir);

  return async (request) => {
    const { inputPath, start, end, outputPath } = request;

    try {
      await fs.access(inputPath);
    } catch (err) {
      throw new CutError(`Input video not found: ${inputPath}`, err);
    }

    if (end - start <= 0) {
      throw new CutError(`Invalid clip duration: ${start}s to ${end}s`);
    }

    await fs.mkdir(path.dirname(outputPath), { recursive: true });

    const command = buildFfmpegCommand(request, format, ffmpegPath);

    log(`START clip | format=${format} | ${start}s → ${end}s`);
    log(`CMD: ${command}`);

    const discardOutput = async () => {
      await fs.rm(outputPath, { force: true });
      log(`REMOVED failed output ${outputPath}`);
    };

    const run = new Promise<void>((resolve, reject) => {
      exec(command, { maxBuffer: 5 * 1024 * 1024 }, (error, _stdout, stderr) => {
        if (stderr) {
          log(`FFMPEG STDERR: ${stderr}`);
        }

        if (error) {
          log(`FFMPEG ERROR: ${error.message}`);
          reject(new CutError(`FFmpeg failed: ${error.message}`, error));
          return;
        }

        resolve();
      });
    });

    try {
      await run;
    } catch (err) {
      // ffmpeg may leave a partial file behind
      await discardOutput();
      throw err;
    }

    let size: number;
    try {
      size = (await fs.stat(outputPath)).size;
    } catch (err) {
      log(`ERROR: Output file not created ${outputPath}`);
      throw new CutError(`Output file not created: ${outputPath}`, err);
    }

    if (size === 0) {
      log(`ERROR: Empty output file ${outputPath}`);
      await discardOutput();
      throw new CutError(`FFmpeg created empty file: ${outputPath}`);
    }

    log(`SUCCESS clip | ${outputPath} | ${(size / 1024 / 1024).toFixed(2)} MB`);

    return outputPath;
  };
}

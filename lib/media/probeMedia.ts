import { exec } from "child_process";
import fs from "fs/promises";
import path from "path";
import { promisify } from "util";
import type { MediaHandle } from "@/lib/types";

const execAsync = promisify(exec);

/**
 * Remote acquisition of a video. Implementations reject with `DownloadError`;
 * retrying is their own concern.
 */
export interface MediaFetcher {
  fetch(url: string): Promise<MediaHandle>;
}

export function parseDuration(stdout: string): number {
  const duration = parseFloat(stdout.trim());
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`Unreadable media duration: "${stdout.trim()}"`);
  }
  return duration;
}

export async function getVideoDuration(videoPath: string): Promise<number> {
  const command = `ffprobe -v error -show_entries format=duration -of default=noprint_wrappers=1:nokey=1 "${videoPath}"`;
  const { stdout } = await execAsync(command);
  return parseDuration(stdout);
}

// MediaHandle for a file that is already on disk
export async function probeMedia(
  videoPath: string,
  mediaId = path.parse(videoPath).name
): Promise<MediaHandle> {
  await fs.access(videoPath);
  const duration = await getVideoDuration(videoPath);
  return Object.freeze({ path: videoPath, mediaId, duration });
}

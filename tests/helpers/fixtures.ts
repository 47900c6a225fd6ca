import fs from "fs/promises";
import os from "os";
import path from "path";
import type { CompletionClient } from "@/lib/ai/completionClient";
import type { TrackInfo, TranscriptSource } from "@/lib/transcript/transcriptSource";
import type {
  ClipArtifact,
  MediaHandle,
  Platform,
  TranscriptLine,
  ValidatedSegment,
} from "@/lib/types";

export async function makeTempDir(prefix = "clips-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function line(start: number, end: number, text: string, language = "en"): TranscriptLine {
  return { start, end, text, language };
}

export function segment(overrides: Partial<ValidatedSegment> = {}): ValidatedSegment {
  return {
    start: 0,
    end: 30,
    title: "Untitled",
    hook: "",
    description: "Untitled",
    platforms: ["YouTube_Shorts"],
    hashtags: [],
    ...overrides,
  };
}

export function artifact(
  index: number,
  overrides: Partial<ValidatedSegment>,
  result: { outputPath: string; status: "Cut" | "Failed"; error?: string }
): ClipArtifact {
  return { index, segment: segment(overrides), ...result };
}

export function media(overrides: Partial<MediaHandle> = {}): MediaHandle {
  return { path: "/videos/demo.mp4", mediaId: "demo", duration: 300, ...overrides };
}

type TrackKey = `${string}:${"manual" | "auto"}`;

/**
 * In-memory caption tracks keyed by `<lang>:manual` / `<lang>:auto`.
 * Translation prefixes each line with the target language.
 */
export function memorySource(
  tracks: Partial<Record<TrackKey, TranscriptLine[]>>
): TranscriptSource & { translated: string[] } {
  const translated: string[] = [];

  return {
    translated,

    async listTracks() {
      return Object.keys(tracks).map((key): TrackInfo => {
        const [language, kind] = key.split(":");
        return { language, isAuto: kind === "auto" };
      });
    },

    async getTrack(_mediaId, language, isAuto = false) {
      const key: TrackKey = `${language}:${isAuto ? "auto" : "manual"}`;
      const lines = tracks[key];
      if (!lines) throw new Error(`Track ${key} not found`);
      return lines;
    },

    async translate(track, targetLanguage) {
      translated.push(targetLanguage);
      return track.map((l) => ({ ...l, text: `[${targetLanguage}] ${l.text}` }));
    },
  };
}

// Client answering with the given responses in order; the last one repeats
export function scriptedClient(...responses: Array<string | Error>): CompletionClient & {
  prompts: string[];
} {
  const prompts: string[] = [];

  return {
    prompts,
    async complete(prompt) {
      const response = responses[Math.min(prompts.length, responses.length - 1)];
      prompts.push(prompt);
      if (response instanceof Error) throw response;
      return response;
    },
  };
}

export function candidates(
  items: Array<{
    start: number | string;
    end: number | string;
    title: string;
    hook?: string;
    description?: string;
    platforms?: Array<Platform | string>;
    hashtags?: string[];
  }>
): string {
  return JSON.stringify(items);
}

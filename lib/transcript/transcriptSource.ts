import type { TranscriptLine } from "@/lib/types";

export type TrackInfo = {
  language: string;
  isAuto: boolean;
};

/**
 * Read-only access to the caption tracks published for a media item.
 * `getTrack` returns lines in source order; normalization happens later.
 */
export interface TranscriptSource {
  listTracks(mediaId: string): Promise<TrackInfo[]>;
  getTrack(
    mediaId: string,
    language: string,
    isAuto?: boolean
  ): Promise<TranscriptLine[]>;
  translate(
    track: readonly TranscriptLine[],
    targetLanguage: string
  ): Promise<TranscriptLine[]>;
}

export type TranscriptTranslator = (
  track: readonly TranscriptLine[],
  targetLanguage: string
) => Promise<TranscriptLine[]>;

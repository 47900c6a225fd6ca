/* -------------------------------------------------------------------------- */
/*                                 PLATFORMS                                  */
/* -------------------------------------------------------------------------- */

export const PLATFORMS = [
  "YouTube_Shorts",
  "TikTok",
  "Instagram_Reels",
  "LinkedIn",
] as const;

export type Platform = (typeof PLATFORMS)[number];

export function mapPlatforms<T>(fn: (platform: Platform) => T): Record<Platform, T> {
  return {
    YouTube_Shorts: fn("YouTube_Shorts"),
    TikTok: fn("TikTok"),
    Instagram_Reels: fn("Instagram_Reels"),
    LinkedIn: fn("LinkedIn"),
  };
}

// Used when the model leaves `platforms` out entirely
export const DEFAULT_PLATFORMS: readonly Platform[] = [
  "YouTube_Shorts",
  "TikTok",
  "Instagram_Reels",
];

/* -------------------------------------------------------------------------- */
/*                                 TRANSCRIPT                                 */
/* -------------------------------------------------------------------------- */

export type TranscriptLine = {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly language: string;
};

export type TranscriptSourceInfo = {
  language: string;
  isAuto: boolean;
  translatedFrom?: string;
};

export type NormalizedTranscript = {
  readonly lines: readonly TranscriptLine[];
  readonly source: TranscriptSourceInfo;
};

/* -------------------------------------------------------------------------- */
/*                                   MEDIA                                    */
/* -------------------------------------------------------------------------- */

export type MediaHandle = {
  readonly path: string;
  readonly mediaId: string;
  readonly duration: number;
};

/* -------------------------------------------------------------------------- */
/*                                  SEGMENTS                                  */
/* -------------------------------------------------------------------------- */

export type ValidatedSegment = {
  readonly start: number;
  readonly end: number;
  readonly title: string;
  readonly hook: string;
  readonly description: string;
  readonly platforms: readonly Platform[];
  readonly hashtags: readonly string[];
};

export type RejectedCandidate = {
  index: number;
  reason: string;
};

/* -------------------------------------------------------------------------- */
/*                                   CLIPS                                    */
/* -------------------------------------------------------------------------- */

export type ClipStatus = "Cut" | "Failed";

export type ClipArtifact = {
  readonly index: number;
  readonly segment: ValidatedSegment;
  readonly outputPath: string;
  readonly status: ClipStatus;
  readonly error?: string;
};

/* -------------------------------------------------------------------------- */
/*                                 RUN REPORT                                 */
/* -------------------------------------------------------------------------- */

export type PipelineState =
  | "Init"
  | "TranscriptFetching"
  | "SegmentExtraction"
  | "ClipCutting"
  | "Organizing"
  | "Done"
  | "Failed";

export type StageName = "transcript" | "extraction" | "cutting" | "organizing";

export type StageStatus =
  | "pending"
  | "ok"
  | "skipped"
  | "degraded"
  | "NoTranscriptAvailable"
  | "ExtractionExhausted";

export type RunError = {
  stage: StageName;
  code: string;
  message: string;
  index?: number;
};

export type PlatformGroups = Record<Platform, string[]>;

export type RunReport = {
  mediaId: string;
  status: "succeeded" | "failed";
  state: PipelineState;
  history: PipelineState[];
  stages: Record<StageName, StageStatus>;
  transcriptSource?: string;
  counts: {
    transcriptLines: number;
    discovered: number;
    validated: number;
    rejected: number;
    cut: number;
    failed: number;
  };
  errors: RunError[];
  outputs: {
    jsonPath?: string;
    textPath?: string;
    platforms: PlatformGroups;
  };
};

export type ClipPipelineErrorCode =
  | "NoTranscriptAvailable"
  | "ExtractionExhausted"
  | "CutError"
  | "DownloadError"
  | "ConfigError";

export class ClipPipelineError extends Error {
  constructor(
    message: string,
    public readonly code: ClipPipelineErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ClipPipelineError";
  }
}

export class NoTranscriptAvailableError extends ClipPipelineError {
  constructor(mediaId: string, cause?: unknown) {
    super(`No transcript available for ${mediaId}`, "NoTranscriptAvailable", cause);
    this.name = "NoTranscriptAvailableError";
  }
}

export class ExtractionExhaustedError extends ClipPipelineError {
  constructor(
    public readonly attempts: number,
    public readonly failures: string[]
  ) {
    super(
      `Segment extraction failed after ${attempts} attempt(s): ${failures.at(-1) ?? "unknown"}`,
      "ExtractionExhausted"
    );
    this.name = "ExtractionExhaustedError";
  }
}

export class CutError extends ClipPipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "CutError", cause);
    this.name = "CutError";
  }
}

export class DownloadError extends ClipPipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "DownloadError", cause);
    this.name = "DownloadError";
  }
}

export class ConfigError extends ClipPipelineError {
  constructor(message: string) {
    super(message, "ConfigError");
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}

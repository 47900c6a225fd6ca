import type { ClipArtifact, ClipStatus, Platform } from "@/lib/types";

export type SegmentRecord = {
  start: number;
  end: number;
  title: string;
  hook: string;
  description: string;
  platforms: Platform[];
  hashtags: string[];
  outputPath: string;
  status: ClipStatus;
  error: string | null;
};

export type StructuredRecord = {
  runName: string;
  totalSegments: number;
  segments: SegmentRecord[];
};

// Keys are written in this order regardless of how the artifact was built
export function toSegmentRecord(artifact: ClipArtifact): SegmentRecord {
  const { segment } = artifact;
  return {
    start: segment.start,
    end: segment.end,
    title: segment.title,
    hook: segment.hook,
    description: segment.description,
    platforms: [...segment.platforms],
    hashtags: [...segment.hashtags],
    outputPath: artifact.outputPath,
    status: artifact.status,
    error: artifact.status === "Failed" ? artifact.error ?? "Unknown error" : null,
  };
}

export function toStructuredRecord(
  artifacts: readonly ClipArtifact[],
  runName: string
): StructuredRecord {
  return {
    runName,
    totalSegments: artifacts.length,
    segments: artifacts.map(toSegmentRecord),
  };
}

export function serializeStructuredRecord(record: StructuredRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}

function orNA(value: string): string {
  return value || "N/A";
}

function seconds(value: number): string {
  return `${Number(value.toFixed(2))}s`;
}

export function formatTextRecord(
  artifacts: readonly ClipArtifact[],
  runName: string
): string {
  const lines = [`Run: ${runName}`, `Total Segments: ${artifacts.length}`, ""];

  artifacts.forEach((artifact, i) => {
    const { segment } = artifact;

    lines.push(
      `--- Segment ${i + 1} ---`,
      `  Title: ${segment.title}`,
      `  Start: ${seconds(segment.start)}`,
      `  End: ${seconds(segment.end)}`,
      `  Duration: ${seconds(segment.end - segment.start)}`,
      `  Hook: ${orNA(segment.hook)}`,
      `  Description: ${orNA(segment.description)}`,
      `  Platforms: ${orNA(segment.platforms.join(", "))}`,
      `  Hashtags: ${orNA(segment.hashtags.join(" "))}`,
      `  Status: ${artifact.status}`,
      `  Output Path: ${artifact.outputPath}`
    );

    if (artifact.status === "Failed") {
      lines.push(`  Error: ${artifact.error ?? "Unknown error"}`);
    }

    lines.push("");
  });

  return lines.join("\n");
}

import fs from "fs/promises";
import path from "path";
import { errorMessage } from "@/lib/errors";
import {
  PLATFORMS,
  mapPlatforms,
  type ClipArtifact,
  type Platform,
  type PlatformGroups,
  type RunError,
} from "@/lib/types";
import { createLogger } from "@/lib/utils/logger";
import {
  formatTextRecord,
  serializeStructuredRecord,
  toStructuredRecord,
} from "./formatRecords";

export type PlatformGrouping = Record<Platform, ClipArtifact[]>;

type OrganizeOptions = {
  outputDir: string;
  runName: string;
};

export type OrganizeResult = {
  groups: PlatformGrouping;
  jsonPath?: string;
  textPath?: string;
  errors: RunError[];
};

const log = createLogger("OUTPUT");

/**
 * Cut artifacts per platform, in artifact order. Failed artifacts are never
 * grouped.
 */
export function groupByPlatform(artifacts: readonly ClipArtifact[]): PlatformGrouping {
  const groups = mapPlatforms((): ClipArtifact[] => []);

  for (const artifact of artifacts) {
    if (artifact.status !== "Cut") continue;
    for (const platform of artifact.segment.platforms) {
      groups[platform].push(artifact);
    }
  }

  return groups;
}

export function groupPaths(groups: PlatformGrouping): PlatformGroups {
  return mapPlatforms((platform) =>
    groups[platform].map((artifact) => artifact.outputPath)
  );
}

async function readLinkIfPresent(linkPath: string): Promise<string | undefined> {
  try {
    const stats = await fs.lstat(linkPath);
    return stats.isSymbolicLink() ? await fs.readlink(linkPath) : "";
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
}

/**
 * Points `<outputDir>/<Platform>/<clip>` at the clip with a relative symlink.
 * A correct existing link is kept; anything else at that name is replaced.
 */
export async function linkIntoPlatform(
  clipPath: string,
  platformDir: string
): Promise<string> {
  const linkPath = path.join(platformDir, path.basename(clipPath));
  const target = path.relative(platformDir, clipPath);

  const existing = await readLinkIfPresent(linkPath);
  if (existing === target) return linkPath;
  if (existing !== undefined) await fs.rm(linkPath, { force: true });

  await fs.symlink(target, linkPath);
  return linkPath;
}

/**
 * Removes links in `platformDir` that are not part of the current grouping.
 * Regular files are left alone.
 */
export async function pruneStaleLinks(
  platformDir: string,
  keep: ReadonlySet<string>
): Promise<string[]> {
  const removed: string[] = [];

  for (const entry of await fs.readdir(platformDir, { withFileTypes: true })) {
    if (!entry.isSymbolicLink() || keep.has(entry.name)) continue;
    await fs.rm(path.join(platformDir, entry.name), { force: true });
    removed.push(entry.name);
  }

  return removed;
}

async function materializePlatformViews(
  groups: PlatformGrouping,
  outputDir: string
): Promise<RunError[]> {
  const errors: RunError[] = [];

  for (const platform of PLATFORMS) {
    const platformDir = path.join(outputDir, platform);

    try {
      await fs.mkdir(platformDir, { recursive: true });
    } catch (err) {
      log.error(`Could not create platform directory ${platformDir}`, err);
      errors.push({
        stage: "organizing",
        code: "PlatformDirError",
        message: `${platform}: ${errorMessage(err)}`,
      });
      continue;
    }

    for (const artifact of groups[platform]) {
      try {
        const linkPath = await linkIntoPlatform(artifact.outputPath, platformDir);
        log.debug(`Linked ${platform}`, linkPath);
      } catch (err) {
        log.error(`Linking failed for ${platform}`, err);
        errors.push({
          stage: "organizing",
          code: "LinkError",
          message: `${platform}: ${errorMessage(err)}`,
          index: artifact.index,
        });
      }
    }

    const keep = new Set(groups[platform].map((a) => path.basename(a.outputPath)));

    try {
      const removed = await pruneStaleLinks(platformDir, keep);
      if (removed.length > 0) log.step(`Removed stale ${platform} links`, removed);
    } catch (err) {
      log.error(`Pruning failed for ${platform}`, err);
      errors.push({
        stage: "organizing",
        code: "PruneError",
        message: `${platform}: ${errorMessage(err)}`,
      });
    }
  }

  return errors;
}

async function writeRecord(
  filePath: string,
  content: string,
  errors: RunError[]
): Promise<string | undefined> {
  try {
    await fs.writeFile(filePath, content, "utf-8");
    log.step("Record saved", filePath);
    return filePath;
  } catch (err) {
    log.error(`Failed to write ${filePath}`, err);
    errors.push({
      stage: "organizing",
      code: "RecordWriteError",
      message: `${path.basename(filePath)}: ${errorMessage(err)}`,
    });
    return undefined;
  }
}

/**
 * Builds the platform groupings, links clips into one directory per platform
 * (dropping links the grouping no longer contains) and writes the JSON and
 * text records. Failures are collected and returned, never thrown. Re-running on the same artifacts rewrites identical records.
 */
export async function organizeOutput(
  artifacts: readonly ClipArtifact[],
  { outputDir, runName }: OrganizeOptions
): Promise<OrganizeResult> {
  const groups = groupByPlatform(artifacts);
  const errors: RunError[] = [];

  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (err) {
    log.error(`Failed to create output directory ${outputDir}`, err);
    errors.push({
      stage: "organizing",
      code: "OutputDirError",
      message: errorMessage(err),
    });
    return { groups, errors };
  }

  errors.push(...(await materializePlatformViews(groups, outputDir)));

  const jsonPath = await writeRecord(
    path.join(outputDir, `${runName}_segments.json`),
    serializeStructuredRecord(toStructuredRecord(artifacts, runName)),
    errors
  );

  const textPath = await writeRecord(
    path.join(outputDir, `${runName}_segments.txt`),
    formatTextRecord(artifacts, runName),
    errors
  );

  log.step("Output organized", {
    platforms: Object.fromEntries(PLATFORMS.map((p) => [p, groups[p].length])),
    errors: errors.length,
  });

  return { groups, jsonPath, textPath, errors };
}

import fs from "fs/promises";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { clipFileNames, cutClips, type CutRequest } from "@/lib/clips/cutClips";
import { CutError } from "@/lib/errors";
import { wait } from "@/lib/utils/wait";
import { makeTempDir, media, segment } from "./helpers/fixtures";

const OUT = "/tmp/run/clips";

const fiveSegments = ["a", "b", "c", "d", "e"].map((title, i) =>
  segment({ title, start: i * 10, end: i * 10 + 5 })
);

describe("clipFileNames", () => {
  it("prefixes the position and slugifies the title", () => {
    expect(
      clipFileNames([
        segment({ title: "Hook One!" }),
        segment({ title: "Hook One!" }),
        segment({ title: "???" }),
      ])
    ).toEqual(["01_hook_one.mp4", "02_hook_one.mp4", "03_clip.mp4"]);
  });

  it("widens the prefix for long runs", () => {
    const names = clipFileNames(Array.from({ length: 120 }, () => segment({ title: "x" })));
    expect(names[0]).toBe("001_x.mp4");
    expect(names[119]).toBe("120_x.mp4");
  });
});

describe("cutClips", () => {
  it("removes a clip left at the planned path when its cut fails", async () => {
    const outputDir = await makeTempDir("cut-");
    const stale = path.join(outputDir, "01_a.mp4");
    await fs.writeFile(stale, "clip from an earlier run");
    const cut = vi.fn(async (): Promise<string> => {
      throw new CutError("FFmpeg failed: boom");
    });

    const artifacts = await cutClips(media(), fiveSegments.slice(0, 1), { cut, outputDir });

    expect(artifacts[0].status).toBe("Failed");
    expect(artifacts[0].outputPath).toBe(stale);
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it("keeps going when one segment fails", async () => {
    const cut = vi.fn(async (request: CutRequest) => {
      if (request.start === 20) throw new CutError("FFmpeg failed: boom");
      return request.outputPath;
    });

    const artifacts = await cutClips(media(), fiveSegments, { cut, outputDir: OUT, concurrency: 2 });

    expect(cut).toHaveBeenCalledTimes(5);
    expect(artifacts).toHaveLength(5);
    expect(artifacts.map((a) => a.status)).toEqual(["Cut", "Cut", "Failed", "Cut", "Cut"]);
    expect(artifacts[2]).toEqual({
      index: 2,
      segment: fiveSegments[2],
      outputPath: path.join(OUT, "03_c.mp4"),
      status: "Failed",
      error: "FFmpeg failed: boom",
    });
  });

  it("passes the media path and segment range to the primitive", async () => {
    const cut = vi.fn(async (request: CutRequest) => request.outputPath);

    await cutClips(media({ path: "/videos/talk.mp4" }), fiveSegments.slice(0, 1), {
      cut,
      outputDir: OUT,
    });

    expect(cut).toHaveBeenCalledWith({
      inputPath: "/videos/talk.mp4",
      start: 0,
      end: 5,
      outputPath: path.join(OUT, "01_a.mp4"),
    });
  });

  it("returns artifacts in segment order whatever order cuts finish in", async () => {
    const delays = [30, 5, 20, 0, 10];
    let inFlight = 0;
    let maxInFlight = 0;

    const cut = async (request: CutRequest) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await wait(delays[request.start / 10]);
      inFlight--;
      return request.outputPath;
    };

    const artifacts = await cutClips(media(), fiveSegments, { cut, outputDir: OUT, concurrency: 3 });

    expect(artifacts.map((a) => a.index)).toEqual([0, 1, 2, 3, 4]);
    expect(artifacts.map((a) => path.basename(a.outputPath))).toEqual([
      "01_a.mp4",
      "02_b.mp4",
      "03_c.mp4",
      "04_d.mp4",
      "05_e.mp4",
    ]);
    expect(maxInFlight).toBeLessThanOrEqual(3);
  });

  it("records the path the primitive reports", async () => {
    const cut = async () => "/elsewhere/clip.mp4";
    const [artifact] = await cutClips(media(), fiveSegments.slice(0, 1), { cut, outputDir: OUT });
    expect(artifact.outputPath).toBe("/elsewhere/clip.mp4");
  });

  it("does nothing for an empty segment list", async () => {
    const cut = vi.fn(async (request: CutRequest) => request.outputPath);
    expect(await cutClips(media(), [], { cut, outputDir: OUT })).toEqual([]);
    expect(cut).not.toHaveBeenCalled();
  });
});

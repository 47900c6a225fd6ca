import fs from "fs/promises";
import path from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { createJsonCaptionSource } from "@/lib/transcript/jsonCaptionSource";
import { normalizeTranscript } from "@/lib/transcript/normalizeTranscript";
import { makeTempDir } from "./helpers/fixtures";

describe("createJsonCaptionSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("captions-");
    await fs.writeFile(
      path.join(dir, "vid1.en.json"),
      JSON.stringify([
        { start: 0, duration: 2, text: "hi" },
        { start: "2.5", end: 4, text: "there" },
      ])
    );
    await fs.writeFile(
      path.join(dir, "vid1.de.auto.json"),
      JSON.stringify([{ start: 0, end: 1, text: "hallo" }])
    );
    await fs.writeFile(path.join(dir, "other.en.json"), "[]");
  });

  it("lists only the tracks of the requested media", async () => {
    const source = createJsonCaptionSource(dir);

    expect(await source.listTracks("vid1")).toEqual([
      { language: "de", isAuto: true },
      { language: "en", isAuto: false },
    ]);
  });

  it("returns no tracks when the directory is missing", async () => {
    const source = createJsonCaptionSource(path.join(dir, "missing"));
    expect(await source.listTracks("vid1")).toEqual([]);
  });

  it("reads lines and derives the end from the duration", async () => {
    const source = createJsonCaptionSource(dir);

    expect(await source.getTrack("vid1", "en")).toEqual([
      { start: 0, end: 2, text: "hi", language: "en" },
      { start: 2.5, end: 4, text: "there", language: "en" },
    ]);
  });

  it("reads auto-generated tracks", async () => {
    const source = createJsonCaptionSource(dir);
    const lines = await source.getTrack("vid1", "de", true);
    expect(lines.map((l) => l.text)).toEqual(["hallo"]);
  });

  it("rejects files that are not a list of lines", async () => {
    await fs.writeFile(path.join(dir, "bad.en.json"), JSON.stringify({ lines: [] }));
    const source = createJsonCaptionSource(dir);

    await expect(source.getTrack("bad", "en")).rejects.toThrow(/Invalid caption file/);
  });

  it("skips malformed lines and keeps the rest of the track", async () => {
    await fs.writeFile(
      path.join(dir, "v.en.json"),
      JSON.stringify([
        { start: 0, end: 5, text: "intro" },
        { start: 5, end: 9 },
        { start: null, end: 12, text: "no start" },
        { start: 9, end: 30, text: "story" },
      ])
    );
    const source = createJsonCaptionSource(dir);

    expect(await source.getTrack("v", "en")).toEqual([
      { start: 0, end: 5, text: "intro", language: "en" },
      { start: 9, end: 30, text: "story", language: "en" },
    ]);
  });

  it("still yields a transcript when one line is broken", async () => {
    await fs.writeFile(
      path.join(dir, "v.en.json"),
      JSON.stringify([
        { start: 0, end: 5, text: "intro" },
        { start: 5, end: 9 },
        { start: 9, end: 30, text: "story" },
      ])
    );

    const transcript = await normalizeTranscript(createJsonCaptionSource(dir), "v");

    expect(transcript.lines.map((l) => l.text)).toEqual(["intro", "story"]);
  });

  it("delegates translation to the configured translator", async () => {
    const source = createJsonCaptionSource(dir, async (track, target) =>
      track.map((l) => ({ ...l, text: l.text.toUpperCase(), language: target }))
    );
    const track = await source.getTrack("vid1", "de", true);

    expect(await source.translate(track, "en")).toEqual([
      { start: 0, end: 1, text: "HALLO", language: "en" },
    ]);
  });

  it("refuses to translate without a translator", async () => {
    const source = createJsonCaptionSource(dir);
    await expect(source.translate([], "en")).rejects.toThrow("No translator configured for en");
  });
});

import { describe, expect, it } from "vitest";
import {
  coerceSeconds,
  normalizeHashtags,
  normalizePlatforms,
  parseSegmentResponse,
} from "@/lib/ai/segments/parseSegmentResponse";
import { candidates } from "./helpers/fixtures";

describe("parseSegmentResponse", () => {
  it("tags unparseable text as a parse error", () => {
    expect(parseSegmentResponse("I could not find any segments.", 300).kind).toBe(
      "parse_error"
    );
  });

  it("tags a non-array payload as a schema error", () => {
    expect(parseSegmentResponse('{"segments": []}', 300)).toEqual({
      kind: "schema_error",
      reason: "Response is not a JSON array",
    });
  });

  it("tags elements that are not objects", () => {
    expect(parseSegmentResponse("[1]", 300)).toEqual({
      kind: "schema_error",
      reason: "Element 0 is not an object",
    });
  });

  it("tags elements missing required keys", () => {
    expect(parseSegmentResponse('[{"start": 1, "end": 2}]', 300)).toEqual({
      kind: "schema_error",
      reason: "Element 0 is missing title",
    });
  });

  it("keeps valid candidates and rejects the rest with their index", () => {
    const raw = candidates([
      { start: 10, end: 40, title: "A" },
      { start: 50, end: 40, title: "B" },
      { start: 290, end: 310, title: "C" },
      { start: 5, end: 20, title: "" },
    ]);

    const outcome = parseSegmentResponse(raw, 300);
    if (outcome.kind !== "ok") throw new Error(`unexpected ${outcome.kind}`);

    expect(outcome.discovered).toBe(4);
    expect(outcome.segments.map((s) => s.title)).toEqual(["A"]);
    expect(outcome.rejected).toEqual([
      { index: 1, reason: "start 50 is not before end 40" },
      { index: 2, reason: "end 310 exceeds media duration 300" },
      { index: 3, reason: "title is empty" },
    ]);
  });

  it("accepts aliased keys and clock timestamps", () => {
    const raw = '[{"start_time": "1:05", "end_time": "90s", "yt_title": " Big moment "}]';

    const outcome = parseSegmentResponse(raw, 100);
    if (outcome.kind !== "ok") throw new Error(`unexpected ${outcome.kind}`);

    expect(outcome.segments).toEqual([
      {
        start: 65,
        end: 90,
        title: "Big moment",
        hook: "",
        description: "Big moment",
        platforms: ["YouTube_Shorts", "TikTok", "Instagram_Reels"],
        hashtags: [],
      },
    ]);
  });

  it("uses the hook as description when none is given", () => {
    const raw = candidates([{ start: 0, end: 20, title: "T", hook: "Wait for it" }]);

    const outcome = parseSegmentResponse(raw, 60);
    if (outcome.kind !== "ok") throw new Error(`unexpected ${outcome.kind}`);

    expect(outcome.segments[0].description).toBe("Wait for it");
  });

  it("reports unknown platforms", () => {
    const raw = candidates([
      { start: 0, end: 20, title: "T", platforms: ["TikTok", "Snapchat"] },
    ]);

    const outcome = parseSegmentResponse(raw, 60);
    if (outcome.kind !== "ok") throw new Error(`unexpected ${outcome.kind}`);

    expect(outcome.segments[0].platforms).toEqual(["TikTok"]);
    expect(outcome.droppedPlatforms).toEqual(["Snapchat"]);
  });

  it("freezes accepted segments", () => {
    const outcome = parseSegmentResponse(candidates([{ start: 0, end: 5, title: "T" }]), 60);
    if (outcome.kind !== "ok") throw new Error(`unexpected ${outcome.kind}`);

    expect(Object.isFrozen(outcome.segments[0])).toBe(true);
    expect(Object.isFrozen(outcome.segments[0].platforms)).toBe(true);
  });

  it("only ever accepts ranges inside the media", () => {
    // Seeded Park-Miller generator
    let seed = 42;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };

    for (let run = 0; run < 50; run++) {
      const duration = 30 + Math.floor(next() * 600);
      const items = Array.from({ length: 8 }, (_, i) => ({
        start: Math.round((next() * 1.4 - 0.2) * duration * 10) / 10,
        end: Math.round((next() * 1.4 - 0.2) * duration * 10) / 10,
        title: next() < 0.1 ? "" : `Clip ${i}`,
      }));

      const outcome = parseSegmentResponse(candidates(items), duration);
      if (outcome.kind !== "ok") throw new Error(`unexpected ${outcome.kind}`);

      expect(outcome.segments.length + outcome.rejected.length).toBe(items.length);
      for (const s of outcome.segments) {
        expect(s.start).toBeGreaterThanOrEqual(0);
        expect(s.start).toBeLessThan(s.end);
        expect(s.end).toBeLessThanOrEqual(duration);
      }
    }
  });
});

describe("coerceSeconds", () => {
  it.each([
    [12, 12],
    ["12.5", 12.5],
    ["12.5s", 12.5],
    ["-3", -3],
    ["1:05", 65],
    ["01:02:03.5", 3723.5],
  ])("reads %j as %d", (input, expected) => {
    expect(coerceSeconds(input)).toBe(expected);
  });

  it.each([["abc"], [Number.NaN], [null], [""]])("rejects %j", (input) => {
    expect(coerceSeconds(input)).toBeUndefined();
  });
});

describe("normalizePlatforms", () => {
  it("matches loosely and returns the canonical order", () => {
    expect(normalizePlatforms(["tiktok", "YouTube Shorts", "reels", "Snapchat"])).toEqual({
      platforms: ["YouTube_Shorts", "TikTok", "Instagram_Reels"],
      dropped: ["Snapchat"],
    });
  });

  it("splits comma separated strings", () => {
    expect(normalizePlatforms("TikTok, LinkedIn").platforms).toEqual(["TikTok", "LinkedIn"]);
  });

  it("defaults when the field is missing", () => {
    expect(normalizePlatforms(undefined).platforms).toEqual([
      "YouTube_Shorts",
      "TikTok",
      "Instagram_Reels",
    ]);
  });
});

describe("normalizeHashtags", () => {
  it("prefixes, deduplicates and drops junk", () => {
    expect(normalizeHashtags(["viral", "#viral", "##fun", "", 3])).toEqual(["#viral", "#fun"]);
  });
});

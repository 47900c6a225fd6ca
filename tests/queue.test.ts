import path from "path";
import { describe, expect, it } from "vitest";
import { parseClipArgs, USAGE } from "@/lib/cli/args";
import { redisConnectionFromUrl } from "@/lib/queue/redis";

describe("redisConnectionFromUrl", () => {
  it("reads host, port, password and database", () => {
    expect(redisConnectionFromUrl("redis://:test-secret@cache.local:6380/2")).toEqual({
      host: "cache.local",
      port: 6380,
      username: undefined,
      password: "test-secret",
      db: 2,
      tls: undefined,
      maxRetriesPerRequest: null,
    });
  });

  it("falls back to the default port and enables TLS for rediss", () => {
    expect(redisConnectionFromUrl("rediss://cache.local")).toMatchObject({
      host: "cache.local",
      port: 6379,
      db: 0,
      tls: {},
    });
  });
});

describe("parseClipArgs", () => {
  it("resolves the video path and reads the flags", () => {
    expect(parseClipArgs(["talk.mp4", "--id", "talk-01", "--run", "batch-7"])).toEqual({
      mediaPath: path.resolve("talk.mp4"),
      mediaId: "talk-01",
      runName: "batch-7",
    });
  });

  it("requires exactly one video", () => {
    expect(() => parseClipArgs([])).toThrow(USAGE);
    expect(() => parseClipArgs(["a.mp4", "b.mp4"])).toThrow(USAGE);
  });
});

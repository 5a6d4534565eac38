import { describe, expect, it } from "vitest";
import { applyConfigEntry, CONFIG_KEYS, configSchema, isConfigKey } from "./schema.js";

describe("configSchema", () => {
  it("parses empty object with defaults", () => {
    expect(configSchema.parse({})).toEqual({
      outputDir: "~/Downloads/vidgrab",
      defaultQuality: "best",
      maxVideos: 10,
      batchConcurrency: 1,
      progressIntervalMs: 200,
      ytDlpPath: "yt-dlp",
      serverHost: "127.0.0.1",
      serverPort: 5000,
    });
  });

  it("rejects unknown quality presets", () => {
    expect(() => configSchema.parse({ defaultQuality: "4k" })).toThrow();
  });

  it("rejects values outside their range", () => {
    expect(() => configSchema.parse({ maxVideos: 0 })).toThrow();
    expect(() => configSchema.parse({ maxVideos: 501 })).toThrow();
    expect(() => configSchema.parse({ batchConcurrency: 6 })).toThrow();
    expect(() => configSchema.parse({ progressIntervalMs: -1 })).toThrow();
  });

  it("accepts all quality presets", () => {
    for (const quality of ["best", "1080p", "720p", "480p", "audio"]) {
      expect(configSchema.parse({ defaultQuality: quality }).defaultQuality).toBe(quality);
    }
  });
});

describe("isConfigKey", () => {
  it("knows every schema key", () => {
    expect(CONFIG_KEYS).toContain("ffmpegLocation");
    expect(isConfigKey("serverPort")).toBe(true);
    expect(isConfigKey("headless")).toBe(false);
    expect(isConfigKey("toString")).toBe(false);
  });
});

describe("applyConfigEntry", () => {
  const current = configSchema.parse({});

  it("converts numeric keys", () => {
    expect(applyConfigEntry(current, "maxVideos", " 25 ").maxVideos).toBe(25);
  });

  it("keeps text keys as given", () => {
    expect(applyConfigEntry(current, "ffmpegLocation", "/opt/ffmpeg/bin").ffmpegLocation).toBe("/opt/ffmpeg/bin");
  });

  it("leaves the other values untouched", () => {
    const updated = applyConfigEntry(current, "defaultQuality", "720p");
    expect(updated).toEqual({ ...current, defaultQuality: "720p" });
  });

  it("rejects invalid input", () => {
    expect(() => applyConfigEntry(current, "serverPort", "http")).toThrow();
    expect(() => applyConfigEntry(current, "defaultQuality", "8k")).toThrow();
  });
});

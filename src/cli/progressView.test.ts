import { describe, expect, it } from "vitest";
import type { ProgressEvent } from "../downloader/types.js";
import { barLabel, progressFields, summarizeBatch } from "./progressView.js";

const progress = (overrides: Partial<ProgressEvent>): ProgressEvent => ({
  jobId: "job",
  phase: "downloading",
  downloadedBytes: 0,
  totalBytes: 0,
  speedBytesPerSec: 0,
  etaSeconds: 0,
  percent: 0,
  ...overrides,
});

describe("progressFields", () => {
  it("formats known values", () => {
    const fields = progressFields(
      progress({ downloadedBytes: 1024 * 1024, totalBytes: 4 * 1024 * 1024, speedBytesPerSec: 512 * 1024, etaSeconds: 75 })
    );

    expect(fields).toEqual({ speed: "512.00 KB/s", eta: "1:15", size: "1.00 MB / 4.00 MB" });
  });

  it("shows placeholders while the transfer is unmeasured", () => {
    expect(progressFields(progress({ downloadedBytes: 2048 }))).toEqual({
      speed: "--",
      eta: "--:--",
      size: "2.00 KB",
    });
  });
});

describe("barLabel", () => {
  it("pads short titles", () => {
    expect(barLabel("Intro", 8)).toBe("Intro   ");
  });

  it("shortens long titles", () => {
    expect(barLabel("A very long video title", 10)).toBe("A very ...");
  });
});

describe("summarizeBatch", () => {
  it("reports a clean run", () => {
    expect(summarizeBatch(1, 0)).toBe("✓ 1 video downloaded successfully");
    expect(summarizeBatch(3, 0)).toBe("✓ 3 videos downloaded successfully");
  });

  it("reports failures", () => {
    expect(summarizeBatch(2, 1)).toBe("Videos: 2 downloaded, 1 failed");
  });
});

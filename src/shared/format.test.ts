import { describe, expect, it } from "vitest";
import { formatBytes, formatDuration, formatSpeed, truncate } from "./format.js";

describe("formatBytes", () => {
  it("keeps small values in bytes", () => {
    expect(formatBytes(500)).toBe("500.00 B");
    expect(formatBytes(0)).toBe("0.00 B");
  });

  it("escalates the unit every 1024", () => {
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.00 MB");
    expect(formatBytes(5.25 * 1024 ** 3)).toBe("5.25 GB");
  });

  it("tops out at terabytes", () => {
    expect(formatBytes(1024 ** 4)).toBe("1.00 TB");
    expect(formatBytes(2048 * 1024 ** 4)).toBe("2048.00 TB");
  });

  it("treats negative and non-finite values as zero", () => {
    expect(formatBytes(-10)).toBe("0.00 B");
    expect(formatBytes(Number.NaN)).toBe("0.00 B");
  });
});

describe("formatSpeed", () => {
  it("appends per-second suffix", () => {
    expect(formatSpeed(2048)).toBe("2.00 KB/s");
  });

  it("returns the fallback for unknown speed", () => {
    expect(formatSpeed(0)).toBe("");
    expect(formatSpeed(0, "-- KB/s")).toBe("-- KB/s");
  });
});

describe("formatDuration", () => {
  it("formats minutes and seconds", () => {
    expect(formatDuration(65)).toBe("1:05");
    expect(formatDuration(0)).toBe("0:00");
    expect(formatDuration(59)).toBe("0:59");
  });

  it("adds hours when needed", () => {
    expect(formatDuration(3661)).toBe("1:01:01");
    expect(formatDuration(36000)).toBe("10:00:00");
  });

  it("drops fractional seconds", () => {
    expect(formatDuration(65.9)).toBe("1:05");
  });
});

describe("truncate", () => {
  it("returns short text unchanged", () => {
    expect(truncate("Intro", 10)).toBe("Intro");
  });

  it("cuts long text with an ellipsis", () => {
    expect(truncate("A very long video title", 10)).toBe("A very ...");
  });
});

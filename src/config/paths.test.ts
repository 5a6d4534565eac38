import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { APP_DIR, DEFAULT_OUTPUT_DIR, expandPath } from "./paths.js";

/** Normalize path to POSIX format for cross-platform test assertions */
const toPosix = (p: string) => p.replace(/\\/g, "/");

describe("expandPath", () => {
  it("expands ~ to home directory", () => {
    const result = toPosix(expandPath("~/Downloads/vidgrab"));
    expect(result).toBe(`${toPosix(homedir())}/Downloads/vidgrab`);
  });

  it("returns absolute paths unchanged", () => {
    expect(expandPath("/usr/local/bin")).toBe("/usr/local/bin");
  });

  it("returns relative paths unchanged", () => {
    expect(expandPath("relative/path")).toBe("relative/path");
  });

  it("handles just ~ correctly", () => {
    expect(expandPath("~")).toBe(homedir());
  });
});

describe("APP_DIR", () => {
  it("lives in the home directory", () => {
    expect(toPosix(APP_DIR)).toBe(`${toPosix(homedir())}/.vidgrab`);
  });

  it("keeps the default download directory unexpanded", () => {
    expect(DEFAULT_OUTPUT_DIR).toBe("~/Downloads/vidgrab");
    expect(toPosix(expandPath(DEFAULT_OUTPUT_DIR))).toBe(`${toPosix(homedir())}/Downloads/vidgrab`);
  });
});

/**
 * Normalization of raw engine counters into ProgressEvents.
 */
import type { RawProgress } from "../engine/types.js";
import type { ProgressEvent, ProgressPhase } from "./types.js";

/**
 * Percentage of a transfer, 0 while the total is unknown, clamped to 0-100.
 */
export function computePercent(downloadedBytes: number, totalBytes: number): number {
  if (!(totalBytes > 0) || !(downloadedBytes > 0)) return 0;
  return Math.min((downloadedBytes / totalBytes) * 100, 100);
}

function toPhase(status: string): ProgressPhase {
  switch (status) {
    case "finished":
      return "finished";
    case "error":
      return "error";
    default:
      return "downloading";
  }
}

function nonNegative(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Builds a ProgressEvent from the engine's counters.
 * The exact total wins over the engine's estimate.
 */
export function normalizeProgress(jobId: string, raw: RawProgress): ProgressEvent {
  const downloadedBytes = nonNegative(raw.downloadedBytes);
  const totalBytes = nonNegative(raw.totalBytes) || nonNegative(raw.totalBytesEstimate);

  return {
    jobId,
    phase: toPhase(raw.status),
    downloadedBytes,
    totalBytes,
    speedBytesPerSec: nonNegative(raw.speed),
    etaSeconds: Math.round(nonNegative(raw.eta)),
    percent: computePercent(downloadedBytes, totalBytes),
    filename: raw.filename,
  };
}

// ============================================================================
// Rate limiting
// ============================================================================

/**
 * Decides which progress events are worth publishing.
 * The first event, every phase change away from "downloading" and 100% always pass;
 * other events pass at most once per interval.
 */
export class ProgressThrottle {
  private lastEmittedAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  shouldEmit(event: ProgressEvent): boolean {
    const now = this.now();
    const due =
      this.lastEmittedAt === null ||
      event.phase !== "downloading" ||
      event.percent >= 100 ||
      now - this.lastEmittedAt >= this.intervalMs;

    if (due) {
      this.lastEmittedAt = now;
    }
    return due;
  }
}

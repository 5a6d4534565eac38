/**
 * Text shown next to progress bars.
 */
import type { ProgressEvent } from "../downloader/types.js";
import { formatBytes, formatDuration, formatSpeed, truncate } from "../shared/format.js";

export const BAR_STYLE = {
  barCompleteChar: "█",
  barIncompleteChar: "░",
  hideCursor: true,
} as const;

export interface ProgressFields {
  speed: string;
  eta: string;
  size: string;
}

/**
 * Fields for a bar payload. Unknown values show as placeholders.
 */
export function progressFields(progress: ProgressEvent): ProgressFields {
  const size =
    progress.totalBytes > 0
      ? `${formatBytes(progress.downloadedBytes)} / ${formatBytes(progress.totalBytes)}`
      : formatBytes(progress.downloadedBytes);

  return {
    speed: formatSpeed(progress.speedBytesPerSec, "--"),
    eta: progress.etaSeconds > 0 ? formatDuration(progress.etaSeconds) : "--:--",
    size,
  };
}

/**
 * Bar label for a video title, padded so stacked bars line up.
 */
export function barLabel(title: string, width = 40): string {
  return truncate(title, width).padEnd(width);
}

/**
 * One-line tally for the end of a batch.
 */
export function summarizeBatch(succeeded: number, failed: number): string {
  if (failed === 0) {
    return `✓ ${succeeded} ${succeeded === 1 ? "video" : "videos"} downloaded successfully`;
  }
  return `Videos: ${succeeded} downloaded, ${failed} failed`;
}

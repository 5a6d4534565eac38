/**
 * Human-readable formatting for byte counts, transfer speeds and durations.
 */

const BYTE_UNITS = ["B", "KB", "MB", "GB"] as const;

/**
 * Formats a byte count with two decimals, escalating the unit every 1024.
 * Example: formatBytes(1536) → "1.50 KB"
 */
export function formatBytes(bytes: number): string {
  let value = Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} TB`;
}

/**
 * Formats a transfer rate, or returns the fallback when the rate is unknown.
 */
export function formatSpeed(bytesPerSec: number, fallback = ""): string {
  if (!Number.isFinite(bytesPerSec) || bytesPerSec <= 0) return fallback;
  return `${formatBytes(bytesPerSec)}/s`;
}

/**
 * Formats seconds as M:SS, or H:MM:SS once an hour is reached.
 * Example: formatDuration(3661) → "1:01:01"
 */
export function formatDuration(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = String(total % 60).padStart(2, "0");

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${secs}`;
  }
  return `${minutes}:${secs}`;
}

/**
 * Shortens text to a maximum length, ending with "..." when cut.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, Math.max(0, maxLength - 3)) + "...";
}

/**
 * Error taxonomy surfaced by the download adapter and the job core.
 */
import { EngineError } from "../engine/types.js";

export type FetchErrorReason = "not-found" | "network-failure" | "parse-failure";

export type DownloadErrorReason =
  | "network-failure"
  | "unsupported-format"
  | "disk-failure"
  | "cancelled"
  | "unknown";

/**
 * Metadata could not be obtained. No job is created.
 */
export class FetchError extends Error {
  readonly reason: FetchErrorReason;

  constructor(reason: FetchErrorReason, message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "FetchError";
    this.reason = reason;
  }
}

/**
 * The engine failed while transferring or post-processing a file.
 */
export class DownloadError extends Error {
  readonly reason: DownloadErrorReason;

  constructor(reason: DownloadErrorReason, message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "DownloadError";
    this.reason = reason;
  }
}

/**
 * Protocol misuse, such as starting a job twice.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

// ============================================================================
// Classification
// ============================================================================

const NOT_FOUND_PATTERN =
  /unsupported url|video unavailable|not found|does not exist|404|no video formats found|private video|has been removed/i;
const UNSUPPORTED_FORMAT_PATTERN =
  /requested format is not available|format .*not available|no such format|invalid format/i;
const DISK_PATTERN =
  /no space left|enospc|permission denied|eacces|read-only file system|erofs|unable to (?:open|write|create)/i;
const NETWORK_PATTERN =
  /http error|unable to download|timed out|timeout|getaddrinfo|connection|network|ssl|resolve host|unreachable|econnreset/i;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a failed metadata query onto the fetch taxonomy.
 */
export function classifyFetchError(error: unknown): FetchError {
  if (error instanceof FetchError) return error;

  const message = errorMessage(error);
  if (error instanceof EngineError && error.kind === "invalid-output") {
    return new FetchError("parse-failure", message, { cause: error });
  }
  if (NOT_FOUND_PATTERN.test(message)) {
    return new FetchError("not-found", message, { cause: error });
  }
  return new FetchError("network-failure", message, { cause: error });
}

/**
 * Maps a failed download onto the download taxonomy.
 */
export function classifyDownloadError(error: unknown): DownloadError {
  if (error instanceof DownloadError) return error;

  const message = errorMessage(error);
  if (error instanceof EngineError && error.kind === "cancelled") {
    return new DownloadError("cancelled", "Download cancelled", { cause: error });
  }
  if (UNSUPPORTED_FORMAT_PATTERN.test(message)) {
    return new DownloadError("unsupported-format", message, { cause: error });
  }
  if (DISK_PATTERN.test(message)) {
    return new DownloadError("disk-failure", message, { cause: error });
  }
  if (NETWORK_PATTERN.test(message)) {
    return new DownloadError("network-failure", message, { cause: error });
  }
  return new DownloadError("unknown", message, { cause: error });
}

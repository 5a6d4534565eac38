/**
 * Command-line construction and output parsing for the yt-dlp engine.
 * Kept free of process handling so it can be tested directly.
 */
import type { DownloadRequest, MetadataOptions, RawProgress } from "./types.js";

// ============================================================================
// Output markers
// ============================================================================

export const PROGRESS_MARKER = "[vidgrab:progress] ";
export const FILE_MARKER = "[vidgrab:file] ";

const PROGRESS_FIELDS = [
  "status",
  "downloaded_bytes",
  "total_bytes",
  "total_bytes_estimate",
  "speed",
  "eta",
  "filename",
] as const;

/**
 * One progress line per hook call, fields separated by "|".
 * The filename goes last since it may itself contain the separator.
 */
export const PROGRESS_TEMPLATE =
  PROGRESS_MARKER + PROGRESS_FIELDS.map((field) => `%(progress.${field})s`).join("|");

// ============================================================================
// Argument builders
// ============================================================================

export function buildMetadataArgs(url: string, options: Omit<MetadataOptions, "signal">): string[] {
  const args = ["-J", "--no-warnings"];

  if (options.flat) {
    args.push("--flat-playlist");
    if (options.maxEntries !== undefined && options.maxEntries > 0) {
      args.push("--playlist-items", `1:${options.maxEntries}`);
    }
  } else {
    args.push("--no-playlist");
  }

  args.push(url);
  return args;
}

export function buildDownloadArgs(
  request: Omit<DownloadRequest, "signal">,
  options: { ffmpegLocation?: string | undefined } = {}
): string[] {
  const { postProcess } = request;
  const args = [
    "--newline",
    "--no-warnings",
    "--no-playlist",
    // --print implies --simulate and --quiet; undo both
    "--no-simulate",
    "--progress",
    "--progress-template",
    PROGRESS_TEMPLATE,
    "--print",
    `after_move:${FILE_MARKER}%(filepath)s`,
    "-f",
    request.formatSelector,
    "-o",
    request.outputTemplate,
    "--merge-output-format",
    postProcess.container,
    "--remux-video",
    postProcess.container,
    "--postprocessor-args",
    `ffmpeg:-c:v copy -c:a ${postProcess.audioCodec} -b:a ${postProcess.audioBitrate}`,
  ];

  if (!postProcess.embedThumbnail) {
    args.push("--no-write-thumbnail", "--no-embed-thumbnail");
  }
  if (!postProcess.keepIntermediateFiles) {
    args.push("--no-keep-video");
  }
  if (options.ffmpegLocation) {
    args.push("--ffmpeg-location", options.ffmpegLocation);
  }

  args.push(request.url);
  return args;
}

// ============================================================================
// Output parsing
// ============================================================================

function parseField(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === "" || trimmed === "NA" || trimmed === "None") return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parses a line written by the progress template.
 * @returns null for any other output line.
 */
export function parseProgressLine(line: string): RawProgress | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(PROGRESS_MARKER.trim())) return null;

  const fields = trimmed.slice(PROGRESS_MARKER.trim().length).trim().split("|");
  const [status = "", downloaded, total, estimate, speed, eta, ...filenameParts] = fields;
  const filename = filenameParts.join("|").trim();

  return {
    status: status.trim() || "downloading",
    downloadedBytes: parseField(downloaded),
    totalBytes: parseField(total),
    totalBytesEstimate: parseField(estimate),
    speed: parseField(speed),
    eta: parseField(eta),
    filename: filename && filename !== "NA" ? filename : undefined,
  };
}

/**
 * Parses the line printed once the final file has been moved into place.
 */
export function parseFinalPathLine(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(FILE_MARKER.trim())) return null;
  const path = trimmed.slice(FILE_MARKER.trim().length).trim();
  return path || null;
}

/**
 * Picks the most useful message from engine stderr output:
 * the last "ERROR:" line, else the last non-empty line.
 */
export function extractEngineMessage(stderr: string, fallback: string): string {
  const lines = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const errorLine = lines.filter((line) => line.startsWith("ERROR:")).at(-1);
  if (errorLine) {
    return errorLine.slice("ERROR:".length).trim();
  }
  return lines.at(-1) ?? fallback;
}

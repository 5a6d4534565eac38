/**
 * Boundary types for the external extraction/download engine.
 * The engine is a black box: selectors and templates pass through verbatim.
 */
import type { EngineInfo } from "./schemas.js";

export type { EngineEntry, EngineFormat, EngineInfo } from "./schemas.js";

/**
 * Raw counters reported by the engine while a file transfers.
 * Unknown values are undefined.
 */
export interface RawProgress {
  status: string;
  downloadedBytes?: number | undefined;
  totalBytes?: number | undefined;
  totalBytesEstimate?: number | undefined;
  speed?: number | undefined;
  eta?: number | undefined;
  filename?: string | undefined;
}

export type ProgressHook = (progress: RawProgress) => void;

export interface MetadataOptions {
  /** List playlist entries without resolving each one */
  flat: boolean;
  /** Engine-side cap on listed entries */
  maxEntries?: number | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * Post-processing the engine applies after the transfer.
 */
export interface PostProcessOptions {
  /** Container every output is merged and remuxed into */
  container: string;
  /** Audio codec and bitrate used when re-encoding the audio track */
  audioCodec: string;
  audioBitrate: string;
  embedThumbnail: boolean;
  keepIntermediateFiles: boolean;
}

export interface DownloadRequest {
  url: string;
  formatSelector: string;
  outputTemplate: string;
  postProcess: PostProcessOptions;
  signal?: AbortSignal | undefined;
}

/**
 * The consumed engine interface.
 */
export interface DownloadEngine {
  /**
   * Runs one metadata-only query. Resolves null when the engine found nothing.
   */
  fetchMetadata(url: string, options: MetadataOptions): Promise<EngineInfo | null>;

  /**
   * Runs one download, calling the hook as the transfer progresses.
   * Resolves with the final file path after post-processing.
   */
  runDownload(request: DownloadRequest, onProgress: ProgressHook): Promise<string>;
}

export type EngineErrorKind =
  /** The engine binary could not be started */
  | "spawn-failed"
  /** The engine exited with a non-zero code */
  | "exited"
  | "cancelled"
  /** The engine finished but its output was unusable */
  | "invalid-output";

/**
 * Failure reported by the engine itself, before classification.
 */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  readonly stderr: string;
  readonly exitCode: number | undefined;

  constructor(
    kind: EngineErrorKind,
    message: string,
    options: { stderr?: string | undefined; exitCode?: number | undefined; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "EngineError";
    this.kind = kind;
    this.stderr = options.stderr ?? "";
    this.exitCode = options.exitCode;
  }
}

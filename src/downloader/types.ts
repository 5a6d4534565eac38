/**
 * Types produced by the download adapter.
 */

// ============================================================================
// Metadata Types
// ============================================================================

/**
 * One format offered by the source, as reported by the engine.
 */
export interface FormatDescriptor {
  formatId: string;
  /** File extension of the format (e.g., "mp4", "webm") */
  container: string;
  /** Engine resolution label, "audio only" when there is no video */
  resolutionLabel: string;
  fileSizeBytes?: number | undefined;
  videoCodec: string;
  audioCodec: string;
  /** Frame height in pixels, 0 for audio-only formats */
  height: number;
  frameRate: number;
}

/**
 * Metadata snapshot from one fetch. Never mutated afterwards.
 */
export interface VideoInfo {
  readonly url: string;
  readonly title: string;
  readonly uploaderName: string;
  /** Whole seconds, 0 when unknown */
  readonly durationSeconds: number;
  readonly thumbnailUrl: string;
  readonly availableFormats: readonly FormatDescriptor[];
}

/**
 * A user-selectable quality: an opaque engine selector plus a label.
 */
export interface QualityOption {
  selector: string;
  label: string;
}

/**
 * One entry of a flat playlist or channel listing.
 */
export interface PlaylistEntry {
  url: string;
  title: string;
  durationSeconds: number;
  thumbnailUrl: string;
}

// ============================================================================
// Progress Types
// ============================================================================

export type ProgressPhase = "downloading" | "finished" | "error";

/**
 * Normalized progress for one job.
 */
export interface ProgressEvent {
  jobId: string;
  phase: ProgressPhase;
  downloadedBytes: number;
  /** 0 when unknown */
  totalBytes: number;
  /** 0 when unknown or paused */
  speedBytesPerSec: number;
  etaSeconds: number;
  /** 0-100, stays 0 while the total is unknown */
  percent: number;
  /** File currently being written, when the engine reports it */
  filename?: string | undefined;
}

export type ProgressCallback = (progress: ProgressEvent) => void;

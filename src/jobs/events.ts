/**
 * Events published by the job core, keyed by scope (job id or batch id).
 */
import type { ProgressEvent } from "../downloader/types.js";

// ============================================================================
// Job Events
// ============================================================================

export interface JobStartedEvent {
  type: "job-started";
  jobId: string;
  batchId?: string | undefined;
  title?: string | undefined;
}

export interface JobProgressEvent {
  type: "job-progress";
  jobId: string;
  batchId?: string | undefined;
  progress: ProgressEvent;
}

export interface JobCompletedEvent {
  type: "job-completed";
  jobId: string;
  batchId?: string | undefined;
  resultPath: string;
}

export interface JobFailedEvent {
  type: "job-failed";
  jobId: string;
  batchId?: string | undefined;
  errorMessage: string;
}

export type JobEvent = JobStartedEvent | JobProgressEvent | JobCompletedEvent | JobFailedEvent;

export type JobTerminalEvent = JobCompletedEvent | JobFailedEvent;

// ============================================================================
// Batch Events
// ============================================================================

export interface BatchProgressEvent {
  type: "batch-progress";
  batchId: string;
  /** 1-based */
  currentIndex: number;
  total: number;
  title: string;
}

export interface VideoCompleteEvent {
  type: "video-complete";
  batchId: string;
  jobId: string;
  success: boolean;
  errorMessage?: string | undefined;
}

export interface BatchCompleteEvent {
  type: "batch-complete";
  batchId: string;
  succeeded: number;
  failed: number;
}

export type BatchEvent = BatchProgressEvent | VideoCompleteEvent | BatchCompleteEvent;

export type OrchestratorEvent = JobEvent | BatchEvent;

/**
 * Where the job core sends its events. The observer hub is the usual sink.
 */
export interface ProgressSink<E = OrchestratorEvent> {
  publish(scope: string, event: E): void;
}

export function isTerminalJobEvent(event: OrchestratorEvent): event is JobTerminalEvent {
  return event.type === "job-completed" || event.type === "job-failed";
}

/**
 * Only progress may be dropped for a subscriber that falls behind.
 */
export function isDroppableEvent(event: OrchestratorEvent): boolean {
  return event.type === "job-progress";
}

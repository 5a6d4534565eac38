/**
 * Maps job core events onto the event names and payloads browser clients listen for.
 */
import { basename } from "node:path";
import type { OrchestratorEvent } from "../jobs/events.js";
import { formatBytes, formatSpeed } from "../shared/format.js";

export interface DownloadProgressPayload {
  id: string;
  status: string;
  /** One decimal */
  percent: number;
  /** e.g. "1.50 MB/s", empty while unknown */
  speed: string;
  eta: number;
  downloaded: string;
  total: string;
  batch_id?: string | undefined;
}

export type WireEvent =
  | { event: "download_started"; data: { id: string } }
  | { event: "download_progress"; data: DownloadProgressPayload }
  | { event: "download_complete"; data: { id: string; filename: string } }
  | { event: "download_error"; data: { id: string; error: string } }
  | { event: "batch_progress"; data: { batch_id: string; current: number; total: number; title: string } }
  | { event: "video_complete"; data: { batch_id: string; video_id: string; success: boolean } }
  | { event: "batch_complete"; data: { batch_id: string; succeeded: number; failed: number } };

export type WireEventName = WireEvent["event"];

export function toWireEvent(event: OrchestratorEvent): WireEvent {
  switch (event.type) {
    case "job-started":
      return { event: "download_started", data: { id: event.jobId } };

    case "job-progress": {
      const { progress } = event;
      return {
        event: "download_progress",
        data: {
          id: event.jobId,
          status: progress.phase,
          percent: Math.round(progress.percent * 10) / 10,
          speed: formatSpeed(progress.speedBytesPerSec),
          eta: progress.etaSeconds,
          downloaded: formatBytes(progress.downloadedBytes),
          total: formatBytes(progress.totalBytes),
          batch_id: event.batchId,
        },
      };
    }

    case "job-completed":
      return { event: "download_complete", data: { id: event.jobId, filename: basename(event.resultPath) } };

    case "job-failed":
      return { event: "download_error", data: { id: event.jobId, error: event.errorMessage } };

    case "batch-progress":
      return {
        event: "batch_progress",
        data: { batch_id: event.batchId, current: event.currentIndex, total: event.total, title: event.title },
      };

    case "video-complete":
      return {
        event: "video_complete",
        data: { batch_id: event.batchId, video_id: event.jobId, success: event.success },
      };

    case "batch-complete":
      return {
        event: "batch_complete",
        data: { batch_id: event.batchId, succeeded: event.succeeded, failed: event.failed },
      };
  }
}

/**
 * Serializes one event in text/event-stream framing.
 */
export function formatSseMessage(wire: WireEvent): string {
  return `event: ${wire.event}\ndata: ${JSON.stringify(wire.data)}\n\n`;
}

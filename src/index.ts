export { Orchestrator, DEFAULT_FILENAME_TEMPLATE } from "./orchestrator.js";
export type { OrchestratorLogger, OrchestratorOptions, StartBatchInput, StartDownloadInput } from "./orchestrator.js";

export { DownloadAdapter, DEFAULT_POST_PROCESS } from "./downloader/adapter.js";
export { DownloadError, FetchError, InvalidStateError } from "./downloader/errors.js";
export type { DownloadErrorReason, FetchErrorReason } from "./downloader/errors.js";
export { buildQualityOptions, QUALITY_PRESETS, resolveQualitySelector } from "./downloader/quality.js";
export type { QualityPreset } from "./downloader/quality.js";
export type {
  FormatDescriptor,
  PlaylistEntry,
  ProgressEvent,
  ProgressPhase,
  QualityOption,
  VideoInfo,
} from "./downloader/types.js";

export { YtDlpEngine } from "./engine/ytDlpEngine.js";
export type { YtDlpEngineOptions } from "./engine/ytDlpEngine.js";
export { EngineError } from "./engine/types.js";
export type { DownloadEngine, DownloadRequest, MetadataOptions, RawProgress } from "./engine/types.js";

export { ObserverHub } from "./events/observerHub.js";
export type { Unsubscribe } from "./events/observerHub.js";
export type { BatchEvent, JobEvent, OrchestratorEvent, ProgressSink } from "./jobs/events.js";
export type { BatchSnapshot, JobSnapshot, JobState } from "./jobs/job.js";
export type { JobHandle } from "./jobs/jobController.js";
export type { BatchHandle, BatchSummary } from "./jobs/batchSequencer.js";

export { createApiServer } from "./server/server.js";
export type { ApiServerOptions } from "./server/server.js";

export { formatBytes, formatDuration, formatSpeed } from "./shared/format.js";

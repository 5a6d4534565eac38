/**
 * Owns the job core: starts downloads and batches, tracks their handles
 * and exposes the observer hub that presentation layers subscribe to.
 */
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { DownloadAdapter } from "./downloader/adapter.js";
import { InvalidStateError } from "./downloader/errors.js";
import { resolveQualitySelector, type QualityPreset } from "./downloader/quality.js";
import type { PlaylistEntry, QualityOption, VideoInfo } from "./downloader/types.js";
import { ObserverHub } from "./events/observerHub.js";
import { BatchSequencer, type BatchHandle, type BatchItem } from "./jobs/batchSequencer.js";
import { isDroppableEvent, isTerminalJobEvent, type OrchestratorEvent, type ProgressSink } from "./jobs/events.js";
import { createJob, isFinished, type BatchSnapshot, type JobSnapshot } from "./jobs/job.js";
import { JobController, type JobHandle } from "./jobs/jobController.js";

export const DEFAULT_FILENAME_TEMPLATE = "%(title)s.%(ext)s";
export const DEFAULT_FINISHED_LIMIT = 100;

/**
 * Subset of pino's logger interface. fastify's logger fits.
 */
export interface OrchestratorLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface OrchestratorOptions {
  adapter: DownloadAdapter;
  outputDir: string;
  filenameTemplate?: string | undefined;
  defaultQuality?: QualityPreset | undefined;
  progressIntervalMs?: number | undefined;
  batchConcurrency?: number | undefined;
  /** Finished jobs and finished batches kept for lookups, each; oldest go first */
  finishedLimit?: number | undefined;
  logger?: OrchestratorLogger | undefined;
}

export interface StartDownloadInput {
  url: string;
  /** Preset name or raw engine selector */
  quality?: string | undefined;
  /** Defaults to the trimmed URL */
  id?: string | undefined;
  title?: string | undefined;
}

export interface StartBatchInput {
  videos: BatchItem[];
  quality?: string | undefined;
  batchId?: string | undefined;
}

export interface OrchestratorActivity {
  runningJobs: number;
  runningBatches: number;
}

interface FinishedBatch {
  batch: BatchSnapshot;
  jobs: JobSnapshot[];
}

/**
 * Insertion-ordered map that forgets its oldest entries beyond a limit.
 */
class RecentMap<V> {
  private readonly entries = new Map<string, V>();

  constructor(private readonly limit: number) {}

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }

  remember(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.limit) break;
      this.entries.delete(oldest);
    }
  }
}

const silentLogger: OrchestratorLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export class Orchestrator {
  readonly events: ObserverHub<OrchestratorEvent>;
  private readonly adapter: DownloadAdapter;
  private readonly controller: JobController;
  private readonly sequencer: BatchSequencer;
  private readonly defaultQuality: QualityPreset;
  private readonly logger: OrchestratorLogger;
  /** Live handles only; settled ones move to the finished maps */
  private readonly jobs = new Map<string, JobHandle>();
  private readonly batches = new Map<string, BatchHandle>();
  private readonly finishedJobs: RecentMap<JobSnapshot>;
  private readonly finishedBatches: RecentMap<FinishedBatch>;
  private readonly sink: ProgressSink<OrchestratorEvent>;
  private closed = false;

  constructor(options: OrchestratorOptions) {
    this.adapter = options.adapter;
    this.defaultQuality = options.defaultQuality ?? "best";
    this.logger = options.logger ?? silentLogger;
    const finishedLimit = Math.max(0, Math.floor(options.finishedLimit ?? DEFAULT_FINISHED_LIMIT));
    this.finishedJobs = new RecentMap(finishedLimit);
    this.finishedBatches = new RecentMap(finishedLimit);

    this.events = new ObserverHub<OrchestratorEvent>({
      isDroppable: isDroppableEvent,
      onListenerError: (error, scope) => {
        this.logger.warn(`Observer of ${scope} failed: ${errorText(error)}`);
      },
    });

    this.sink = {
      publish: (scope, event) => {
        this.events.publish(scope, event);
        // Batch jobs publish under the batch scope too; log each job once
        if (isTerminalJobEvent(event) && scope === event.jobId) {
          if (event.type === "job-completed") {
            this.logger.info(`Job ${event.jobId} completed: ${event.resultPath}`);
          } else {
            this.logger.error(`Job ${event.jobId} failed: ${event.errorMessage}`);
          }
        }
      },
    };

    this.controller = new JobController({
      adapter: options.adapter,
      outputTemplate: join(options.outputDir, options.filenameTemplate ?? DEFAULT_FILENAME_TEMPLATE),
      progressIntervalMs: options.progressIntervalMs,
      onSinkError: (error, event) => {
        this.logger.warn(`Could not publish ${event.type} for ${event.jobId}: ${errorText(error)}`);
      },
    });

    this.sequencer = new BatchSequencer({
      controller: this.controller,
      concurrency: options.batchConcurrency,
      onSinkError: (error, event) => {
        this.logger.warn(`Could not publish ${event.type} for ${event.batchId}: ${errorText(error)}`);
      },
    });
  }

  // ==========================================================================
  // Metadata
  // ==========================================================================

  fetchInfo(url: string): Promise<VideoInfo> {
    return this.adapter.fetchInfo(url.trim());
  }

  listQualityOptions(url: string): Promise<QualityOption[]> {
    return this.adapter.listQualityOptions(url.trim());
  }

  listPlaylistEntries(url: string, maxEntries?: number): Promise<PlaylistEntry[]> {
    return this.adapter.listPlaylistEntries(url.trim(), maxEntries);
  }

  // ==========================================================================
  // Downloads
  // ==========================================================================

  /**
   * Starts one download and returns its handle at once.
   * @throws InvalidStateError for an empty URL or an id that is still running
   */
  startDownload(input: StartDownloadInput): JobHandle {
    this.assertOpen();
    if (!input.url.trim()) {
      throw new InvalidStateError("A video URL is required");
    }

    const job = createJob({
      url: input.url,
      id: input.id,
      title: input.title,
      qualitySelector: resolveQualitySelector(input.quality, this.defaultQuality),
    });
    if (this.isJobLive(job.id)) {
      throw new InvalidStateError(`Job ${job.id} is already running`);
    }

    const handle = this.controller.start(job, this.sink);
    this.jobs.set(job.id, handle);
    void handle.done.then((final) => {
      if (this.jobs.get(final.id) !== handle) return;
      this.jobs.delete(final.id);
      this.finishedJobs.remember(final.id, final);
    });
    this.logger.info(`Job ${job.id} started: ${job.url}`);
    return handle;
  }

  /**
   * Starts a batch of downloads that run one after another.
   * @throws InvalidStateError for an empty batch or a batch id that is still running
   */
  startBatch(input: StartBatchInput): BatchHandle {
    this.assertOpen();
    const videos = input.videos.filter((video) => video.url.trim());
    if (videos.length === 0) {
      throw new InvalidStateError("A batch needs at least one video URL");
    }

    const batchId = input.batchId?.trim() || `batch-${randomUUID().slice(0, 8)}`;
    if (this.batches.has(batchId)) {
      throw new InvalidStateError(`Batch ${batchId} is already running`);
    }

    const handle = this.sequencer.run(
      {
        batchId,
        items: videos,
        qualitySelector: resolveQualitySelector(input.quality, this.defaultQuality),
      },
      this.sink
    );
    this.batches.set(batchId, handle);
    void handle.done.then(() => {
      if (this.batches.get(batchId) !== handle) return;
      this.batches.delete(batchId);
      this.finishedBatches.remember(batchId, { batch: handle.batch, jobs: handle.jobs });
    });
    this.logger.info(`Batch ${batchId} started with ${videos.length} videos`);
    return handle;
  }

  getJob(id: string): JobSnapshot | undefined {
    const single = this.jobs.get(id);
    if (single) return single.job;

    for (const batch of this.batches.values()) {
      const job = batch.jobs.find((candidate) => candidate.id === id);
      if (job) return job;
    }

    const finished = this.finishedJobs.get(id);
    if (finished) return finished;

    for (const batch of this.finishedBatches.values()) {
      const job = batch.jobs.find((candidate) => candidate.id === id);
      if (job) return job;
    }
    return undefined;
  }

  getBatch(id: string): BatchSnapshot | undefined {
    return this.batches.get(id)?.batch ?? this.finishedBatches.get(id)?.batch;
  }

  /** Counts of jobs and batches that have not settled yet */
  activity(): OrchestratorActivity {
    return { runningJobs: this.jobs.size, runningBatches: this.batches.size };
  }

  /**
   * Cancels a job or a whole batch by id.
   * @returns false when nothing live has that id
   */
  cancel(id: string): boolean {
    const single = this.jobs.get(id);
    if (single && !isFinished(single.job)) {
      single.cancel();
      return true;
    }

    const batch = this.batches.get(id);
    if (batch && batch.batch.state !== "completed") {
      batch.cancel();
      return true;
    }

    for (const handle of this.batches.values()) {
      const job = handle.jobs.find((candidate) => candidate.id === id);
      if (job && !isFinished(job)) {
        return handle.cancelJob(id);
      }
    }
    return false;
  }

  /**
   * Cancels everything still running, waits for it to settle and drops all observers.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    for (const handle of this.batches.values()) handle.cancel();
    for (const handle of this.jobs.values()) handle.cancel();

    await Promise.all([
      ...[...this.jobs.values()].map((handle) => handle.done),
      ...[...this.batches.values()].map((handle) => handle.done),
    ]);
    await this.events.idle();
    this.events.close();
  }

  private isJobLive(id: string): boolean {
    const job = this.getJob(id);
    return job !== undefined && !isFinished(job);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new InvalidStateError("Downloads are shutting down");
    }
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

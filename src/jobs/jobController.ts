/**
 * Runs one job on its own async task and reports its lifecycle through a sink.
 */
import type { DownloadAdapter } from "../downloader/adapter.js";
import { DownloadError, InvalidStateError } from "../downloader/errors.js";
import { normalizeProgress, ProgressThrottle } from "../downloader/progress.js";
import type { JobEvent, ProgressSink } from "./events.js";
import { snapshotJob, type Job, type JobSnapshot } from "./job.js";

export const DEFAULT_PROGRESS_INTERVAL_MS = 200;

export interface JobControllerOptions {
  adapter: DownloadAdapter;
  /** Engine output template, e.g. "/downloads/%(title)s.%(ext)s" */
  outputTemplate: string;
  progressIntervalMs?: number | undefined;
  /** Clock used for progress throttling */
  now?: (() => number) | undefined;
  /** Receives errors thrown by the sink */
  onSinkError?: ((error: unknown, event: JobEvent) => void) | undefined;
}

export interface JobHandle {
  /** Current snapshot of the job */
  readonly job: JobSnapshot;
  /** Settles with the final snapshot. Never rejects. */
  readonly done: Promise<JobSnapshot>;
  /** Aborts the transfer. The job ends failed with "Download cancelled". */
  cancel(): void;
}

function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.trim() || "Download failed";
}

export class JobController {
  private readonly adapter: DownloadAdapter;
  private readonly outputTemplate: string;
  private readonly progressIntervalMs: number;
  private readonly now: () => number;
  private readonly onSinkError: (error: unknown, event: JobEvent) => void;

  constructor(options: JobControllerOptions) {
    this.adapter = options.adapter;
    this.outputTemplate = options.outputTemplate;
    this.progressIntervalMs = Math.max(0, options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS);
    this.now = options.now ?? Date.now;
    this.onSinkError = options.onSinkError ?? (() => undefined);
  }

  /**
   * Starts a pending job and returns at once.
   * @throws InvalidStateError when the job has already been started
   */
  start(job: Job, sink: ProgressSink<JobEvent>): JobHandle {
    if (job.state !== "pending") {
      throw new InvalidStateError(`Job ${job.id} cannot be started: it is ${job.state}`);
    }

    job.state = "running";
    job.startedAt = new Date();

    const abort = new AbortController();
    const done = Promise.resolve().then(() => this.run(job, sink, abort.signal));

    return {
      get job() {
        return snapshotJob(job);
      },
      done,
      cancel: () => abort.abort(),
    };
  }

  private async run(job: Job, sink: ProgressSink<JobEvent>, signal: AbortSignal): Promise<JobSnapshot> {
    const emit = (event: JobEvent): void => {
      try {
        sink.publish(job.id, event);
      } catch (error) {
        this.onSinkError(error, event);
      }
    };

    let settled = false;
    const throttle = new ProgressThrottle(this.progressIntervalMs, this.now);

    emit({ type: "job-started", jobId: job.id, batchId: job.batchId, title: job.title });

    try {
      const resultPath = await this.adapter.download(
        job.url,
        job.qualitySelector,
        this.outputTemplate,
        (raw) => {
          if (settled || signal.aborted) return;
          const progress = normalizeProgress(job.id, raw);
          if (throttle.shouldEmit(progress)) {
            emit({ type: "job-progress", jobId: job.id, batchId: job.batchId, progress });
          }
        },
        signal
      );

      if (signal.aborted) {
        throw new DownloadError("cancelled", "Download cancelled");
      }

      settled = true;
      job.state = "completed";
      job.resultPath = resultPath;
      job.finishedAt = new Date();
      emit({ type: "job-completed", jobId: job.id, batchId: job.batchId, resultPath });
    } catch (error) {
      settled = true;
      job.state = "failed";
      job.errorMessage = describeError(error);
      job.finishedAt = new Date();
      emit({ type: "job-failed", jobId: job.id, batchId: job.batchId, errorMessage: job.errorMessage });
    }

    return snapshotJob(job);
  }
}

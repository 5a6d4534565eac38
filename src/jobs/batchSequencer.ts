import PQueue from "p-queue";
import type { BatchEvent, JobEvent, OrchestratorEvent, ProgressSink } from "./events.js";
import type { JobController, JobHandle } from "./jobController.js";
import { createJob, snapshotBatch, snapshotJob, type Batch, type BatchSnapshot, type Job, type JobSnapshot } from "./job.js";

export const BATCH_CANCELLED_MESSAGE = "Batch cancelled";
export const JOB_CANCELLED_MESSAGE = "Download cancelled";
export const MAX_BATCH_CONCURRENCY = 5;

export interface BatchItem {
  url: string;
  title?: string | undefined;
}

export interface BatchInput {
  batchId: string;
  items: BatchItem[];
  qualitySelector: string;
}

export interface BatchFailure {
  jobId: string;
  url: string;
  title: string;
  errorMessage: string;
}

export interface BatchSummary {
  batchId: string;
  succeeded: number;
  failed: number;
  failures: BatchFailure[];
}

export interface BatchHandle {
  readonly batch: BatchSnapshot;
  /** Snapshots of every job in the batch, in item order */
  readonly jobs: JobSnapshot[];
  /** Settles after batch-complete has been published. Never rejects. */
  readonly done: Promise<BatchSummary>;
  /** Skips pending items and cancels running ones */
  cancel(): void;
  /** Cancels one job of the batch. Returns false when the id is not part of it. */
  cancelJob(jobId: string): boolean;
}

export interface BatchSequencerOptions {
  controller: JobController;
  /** Items run at once, 1 (strictly sequential) by default */
  concurrency?: number | undefined;
  /** Receives errors thrown by the sink for batch events */
  onSinkError?: ((error: unknown, event: BatchEvent) => void) | undefined;
}

const UNKNOWN_TITLE = "Unknown";

/**
 * Runs the items of a batch through the job controller, in order,
 * publishing batch-level events under the batch id.
 * A failing item never stops the batch.
 */
export class BatchSequencer {
  private readonly controller: JobController;
  private readonly concurrency: number;
  private readonly onSinkError: (error: unknown, event: BatchEvent) => void;

  constructor(options: BatchSequencerOptions) {
    this.controller = options.controller;
    this.onSinkError = options.onSinkError ?? (() => undefined);
    this.concurrency = Math.min(MAX_BATCH_CONCURRENCY, Math.max(1, Math.floor(options.concurrency ?? 1)));
  }

  run(input: BatchInput, sink: ProgressSink<OrchestratorEvent>): BatchHandle {
    const { batchId, items } = input;
    const jobs: Job[] = items.map((item, index) =>
      createJob({
        id: `${batchId}_${index}`,
        url: item.url,
        qualitySelector: input.qualitySelector,
        batchId,
        title: item.title,
      })
    );
    const batch: Batch = {
      id: batchId,
      jobIds: jobs.map((job) => job.id),
      currentIndex: 0,
      succeeded: 0,
      failed: 0,
      state: "pending",
    };

    const running = new Map<string, JobHandle>();
    const skipped = new Set<string>();
    const failures: BatchFailure[] = [];
    const queue = new PQueue({ concurrency: this.concurrency });
    let cancelled = false;

    const publishBatch = (event: BatchEvent): void => {
      try {
        sink.publish(batchId, event);
      } catch (error) {
        this.onSinkError(error, event);
      }
    };

    // Job events go to the job's own scope and to the batch scope.
    // Both copies are attempted; the first failure is rethrown for the controller to report.
    const jobSink: ProgressSink<JobEvent> = {
      publish: (scope, event) => {
        const failures: unknown[] = [];
        for (const target of [scope, batchId]) {
          try {
            sink.publish(target, event);
          } catch (error) {
            failures.push(error);
          }
        }
        if (failures.length > 0) {
          throw failures[0];
        }
      },
    };

    const recordFailure = (job: Job, index: number, errorMessage: string): void => {
      batch.failed++;
      failures.push({
        jobId: job.id,
        url: job.url,
        title: items[index]?.title ?? UNKNOWN_TITLE,
        errorMessage,
      });
    };

    const processItem = async (job: Job, index: number): Promise<void> => {
      if (cancelled || skipped.has(job.id)) {
        const errorMessage = cancelled ? BATCH_CANCELLED_MESSAGE : JOB_CANCELLED_MESSAGE;
        job.state = "failed";
        job.errorMessage = errorMessage;
        job.finishedAt = new Date();
        recordFailure(job, index, errorMessage);
        publishBatch({ type: "video-complete", batchId, jobId: job.id, success: false, errorMessage });
        return;
      }

      batch.currentIndex = index + 1;
      publishBatch({
        type: "batch-progress",
        batchId,
        currentIndex: index + 1,
        total: jobs.length,
        title: items[index]?.title ?? UNKNOWN_TITLE,
      });

      const handle = this.controller.start(job, jobSink);
      running.set(job.id, handle);
      const result = await handle.done;
      running.delete(job.id);

      if (result.state === "completed") {
        batch.succeeded++;
      } else {
        recordFailure(job, index, result.errorMessage ?? "Download failed");
      }

      publishBatch({
        type: "video-complete",
        batchId,
        jobId: job.id,
        success: result.state === "completed",
        errorMessage: result.errorMessage,
      });
    };

    batch.state = "running";
    const done = queue
      .addAll(jobs.map((job, index) => () => processItem(job, index)))
      .then(() => {
        batch.state = "completed";
        publishBatch({ type: "batch-complete", batchId, succeeded: batch.succeeded, failed: batch.failed });
        return { batchId, succeeded: batch.succeeded, failed: batch.failed, failures };
      });

    return {
      get batch() {
        return snapshotBatch(batch);
      },
      get jobs() {
        return jobs.map(snapshotJob);
      },
      done,
      cancel: () => {
        cancelled = true;
        for (const handle of running.values()) handle.cancel();
      },
      cancelJob: (jobId) => {
        const job = jobs.find((candidate) => candidate.id === jobId);
        if (!job) return false;
        const handle = running.get(jobId);
        if (handle) {
          handle.cancel();
        } else if (job.state === "pending") {
          skipped.add(jobId);
        }
        return true;
      },
    };
  }
}

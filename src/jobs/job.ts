/**
 * Job and batch records owned by the job core.
 */

export type JobState = "pending" | "running" | "completed" | "failed";

/**
 * One download request and its lifecycle.
 * `resultPath` is set only when completed, `errorMessage` only when failed.
 */
export interface Job {
  readonly id: string;
  readonly url: string;
  readonly qualitySelector: string;
  readonly batchId?: string | undefined;
  readonly title?: string | undefined;
  readonly createdAt: Date;
  state: JobState;
  resultPath?: string | undefined;
  errorMessage?: string | undefined;
  startedAt?: Date | undefined;
  finishedAt?: Date | undefined;
}

export type JobSnapshot = Readonly<Job>;

export interface NewJob {
  url: string;
  qualitySelector: string;
  /** Defaults to the trimmed URL */
  id?: string | undefined;
  batchId?: string | undefined;
  title?: string | undefined;
}

export function createJob(input: NewJob, now: Date = new Date()): Job {
  const url = input.url.trim();
  const id = input.id?.trim() || url;

  return {
    id,
    url,
    qualitySelector: input.qualitySelector,
    batchId: input.batchId,
    title: input.title,
    createdAt: now,
    state: "pending",
  };
}

export function snapshotJob(job: Job): JobSnapshot {
  return Object.freeze({ ...job });
}

export function isFinished(job: Pick<Job, "state">): boolean {
  return job.state === "completed" || job.state === "failed";
}

// ============================================================================
// Batches
// ============================================================================

export type BatchState = "pending" | "running" | "completed";

export interface Batch {
  readonly id: string;
  readonly jobIds: readonly string[];
  /** 1-based index of the item most recently started, 0 before the first */
  currentIndex: number;
  succeeded: number;
  failed: number;
  state: BatchState;
}

export type BatchSnapshot = Readonly<Batch>;

export function snapshotBatch(batch: Batch): BatchSnapshot {
  return Object.freeze({ ...batch });
}

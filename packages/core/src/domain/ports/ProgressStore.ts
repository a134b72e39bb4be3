import type { JobMetadata, PartDescriptor, PendingPart } from '../model/Job.js';
import type { JobStatusSnapshot, PartStatus } from '../model/JobStatus.js';

/**
 * Port for the shared ledger that holds every job's progress.
 *
 * Workers in different processes call `completePart()` against the same
 * backing store without coordinating, so implementations must make the
 * check-remove-decrement of a part one atomic unit per job: removing the
 * pending entry is what licenses the decrement, and only the call that
 * brings `remaining` to zero may report completion.
 *
 * Every operation that needs an existing job rejects with
 * `JobDoesNotExistError` when the job record is absent. Errors from the
 * backing store propagate unchanged.
 */
export interface ProgressStore {
  /** When `true`, the call that completes a job also deletes it. */
  readonly deleteWhenDone: boolean;

  /** Register (or reset) a job with one pending entry per descriptor, indexed from zero. */
  registerJob(jobId: string, parts: readonly PartDescriptor[], topic?: string): Promise<void>;
  /**
   * Mark a part as complete. Idempotent.
   * @returns `true` only for the call that brought `remaining` to zero.
   */
  completePart(jobId: string, index: number): Promise<boolean>;
  /** Flag the job as failed. Completion tracking is unaffected. */
  failJob(jobId: string, reason: string): Promise<void>;
  /** Merge `metadata` into the job's metadata, overwriting keys it names. */
  setMetadata(jobId: string, metadata: JobMetadata): Promise<void>;
  getStatus(jobId: string): Promise<JobStatusSnapshot>;
  getPartStatus(jobId: string, index: number): Promise<PartStatus>;
  /** Lazily enumerate the identifiers of every job whose record exists. */
  listJobIds(): AsyncIterable<string>;
  /** Resolve to a lazy, restartable sequence of pending part descriptors in index order. */
  listPendingParts(jobId: string): Promise<AsyncIterable<PartDescriptor>>;
  /** Same as `listPendingParts()` but keeps each part's index. */
  listPendingPartEntries(jobId: string): Promise<AsyncIterable<PendingPart>>;
  /** Remove the job and its pending parts. Deleting a missing job is a no-op. */
  deleteJob(jobId: string): Promise<void>;
}

import type { JobMetadata, JobRecord } from './Job.js';
import { computeProgress } from './Job.js';

/** Point-in-time view of a job returned by `getStatus()`. */
export interface JobStatusSnapshot {
  readonly jobId: string;
  readonly total: number;
  readonly remaining: number;
  /** `(total - remaining) / total`, or `0` for a job without parts. */
  readonly progress: number;
  readonly failed: boolean;
  readonly failureReason?: string;
  readonly metadata: JobMetadata;
  readonly topic?: string;
}

/** Completion state of a single part. */
export interface PartStatus {
  readonly jobId: string;
  readonly part: number;
  /** `true` once the part is no longer pending. */
  readonly complete: boolean;
}

/** One entry produced by `listJobs()` when statuses are requested. */
export interface JobListing {
  readonly jobId: string;
  readonly status: JobStatusSnapshot;
}

export function toStatusSnapshot(record: JobRecord): JobStatusSnapshot {
  const snapshot: JobStatusSnapshot = {
    jobId: record.jobId,
    total: record.total,
    remaining: record.remaining,
    progress: computeProgress(record.total, record.remaining),
    failed: record.failed,
    metadata: { ...record.metadata },
  };

  return {
    ...snapshot,
    ...(record.failureReason !== undefined ? { failureReason: record.failureReason } : {}),
    ...(record.topic !== undefined ? { topic: record.topic } : {}),
  };
}

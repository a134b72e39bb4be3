/** Caller-defined description of one part, e.g. a reference to the work item. Must be JSON-serializable. */
export type PartDescriptor = Readonly<Record<string, unknown>>;

/** Free-form string annotations attached to a job. */
export type JobMetadata = Readonly<Record<string, string>>;

/** Per-job summary state. Its existence is what makes a job "exist". */
export interface JobRecord {
  readonly jobId: string;
  /** Number of parts registered. Never changes after registration. */
  readonly total: number;
  /** Parts not yet completed. Only ever decreases. */
  readonly remaining: number;
  /** Sticky failure flag set by `failJob()`. */
  readonly failed: boolean;
  /** Reason passed to the most recent `failJob()`. */
  readonly failureReason?: string;
  readonly metadata: JobMetadata;
  /** Dispatch topic the job was registered under. Stored verbatim, never interpreted. */
  readonly topic?: string;
  /** Epoch timestamp of the registration that created this record. */
  readonly registeredAt: number;
}

/** A part that has not been completed yet. */
export interface PendingPart {
  /** Zero-based position of the part within the job. */
  readonly index: number;
  readonly descriptor: PartDescriptor;
}

export function createJobRecord(jobId: string, totalParts: number, topic?: string, now = Date.now()): JobRecord {
  return {
    jobId,
    total: totalParts,
    remaining: totalParts,
    failed: false,
    metadata: {},
    topic,
    registeredAt: now,
  };
}

/** Fraction of parts completed, in `[0, 1]`. A job with no parts reports `0`. */
export function computeProgress(total: number, remaining: number): number {
  if (total === 0) return 0;
  return (total - remaining) / total;
}

export function mergeMetadata(current: JobMetadata, updates: JobMetadata): JobMetadata {
  return { ...current, ...updates };
}

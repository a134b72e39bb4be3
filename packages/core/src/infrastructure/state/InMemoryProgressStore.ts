import type { ProgressStore } from '../../domain/ports/ProgressStore.js';
import type { JobMetadata, JobRecord, PartDescriptor, PendingPart } from '../../domain/model/Job.js';
import { createJobRecord, mergeMetadata } from '../../domain/model/Job.js';
import type { JobStatusSnapshot, PartStatus } from '../../domain/model/JobStatus.js';
import { toStatusSnapshot } from '../../domain/model/JobStatus.js';
import { assertPartIndex } from '../../domain/model/PartIndex.js';
import { JobDoesNotExistError } from '../../domain/errors.js';
import { restartable } from '../../utils/restartable.js';

export interface InMemoryProgressStoreOptions {
  /** Delete a job in the same step that completes it. Default: `false`. */
  readonly deleteWhenDone?: boolean;
}

/**
 * Non-persistent ProgressStore for tests and single-process use.
 *
 * Every mutation runs to completion without yielding to the event loop, which
 * makes each one atomic with respect to other callers in the same process.
 * Jobs are enumerated in registration order.
 */
export class InMemoryProgressStore implements ProgressStore {
  readonly deleteWhenDone: boolean;
  private readonly jobs = new Map<string, JobRecord>();
  private readonly parts = new Map<string, Map<number, PartDescriptor>>();

  constructor(options: InMemoryProgressStoreOptions = {}) {
    this.deleteWhenDone = options.deleteWhenDone ?? false;
  }

  async registerJob(jobId: string, parts: readonly PartDescriptor[], topic?: string): Promise<void> {
    // Re-registration moves the job to the end of the enumeration order.
    this.jobs.delete(jobId);
    this.jobs.set(jobId, createJobRecord(jobId, parts.length, topic));

    if (parts.length === 0) {
      this.parts.delete(jobId);
    } else {
      this.parts.set(jobId, new Map(parts.map((descriptor, index) => [index, { ...descriptor }])));
    }
  }

  async completePart(jobId: string, index: number): Promise<boolean> {
    const job = this.requireJob(jobId);
    assertPartIndex(jobId, index, job.total);

    const pending = this.parts.get(jobId);
    if (!pending?.delete(index)) return false;
    if (pending.size === 0) this.parts.delete(jobId);

    const remaining = job.remaining - 1;
    if (remaining === 0 && this.deleteWhenDone) {
      this.removeJob(jobId);
      return true;
    }

    this.jobs.set(jobId, { ...job, remaining });
    return remaining === 0;
  }

  async failJob(jobId: string, reason: string): Promise<void> {
    const job = this.requireJob(jobId);
    this.jobs.set(jobId, { ...job, failed: true, failureReason: reason });
  }

  async setMetadata(jobId: string, metadata: JobMetadata): Promise<void> {
    const job = this.requireJob(jobId);
    this.jobs.set(jobId, { ...job, metadata: mergeMetadata(job.metadata, metadata) });
  }

  async getStatus(jobId: string): Promise<JobStatusSnapshot> {
    return toStatusSnapshot(this.requireJob(jobId));
  }

  async getPartStatus(jobId: string, index: number): Promise<PartStatus> {
    const job = this.requireJob(jobId);
    assertPartIndex(jobId, index, job.total);
    const pending = this.parts.get(jobId);
    return { jobId, part: index, complete: !pending?.has(index) };
  }

  listJobIds(): AsyncIterable<string> {
    return restartable(() => this.scanJobIds());
  }

  async listPendingParts(jobId: string): Promise<AsyncIterable<PartDescriptor>> {
    this.requireJob(jobId);
    return restartable(() => this.scanPendingDescriptors(jobId));
  }

  async listPendingPartEntries(jobId: string): Promise<AsyncIterable<PendingPart>> {
    this.requireJob(jobId);
    return restartable(() => this.scanPendingParts(jobId));
  }

  async deleteJob(jobId: string): Promise<void> {
    this.removeJob(jobId);
  }

  private requireJob(jobId: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobDoesNotExistError(jobId);
    return job;
  }

  private removeJob(jobId: string): void {
    this.jobs.delete(jobId);
    this.parts.delete(jobId);
  }

  private async *scanJobIds(): AsyncGenerator<string> {
    for (const jobId of [...this.jobs.keys()]) {
      if (this.jobs.has(jobId)) yield jobId;
    }
  }

  private async *scanPendingParts(jobId: string): AsyncGenerator<PendingPart> {
    const pending = this.parts.get(jobId);
    if (!pending) return;
    const entries = [...pending.entries()].sort(([a], [b]) => a - b);
    for (const [index, descriptor] of entries) {
      yield { index, descriptor };
    }
  }

  private async *scanPendingDescriptors(jobId: string): AsyncGenerator<PartDescriptor> {
    for await (const part of this.scanPendingParts(jobId)) {
      yield part.descriptor;
    }
  }
}

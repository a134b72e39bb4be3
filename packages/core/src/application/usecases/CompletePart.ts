import type { TrackerContext } from '../TrackerContext.js';
import { parseJobId, parsePartIndex } from '../validation.js';

/**
 * Use case: record that one part of a job has finished.
 *
 * Safe to call more than once for the same part (at-least-once delivery); only
 * the call that completes the job resolves to `true`.
 */
export class CompletePart {
  constructor(private readonly ctx: TrackerContext) {}

  async execute(jobId: string, part: number): Promise<boolean> {
    const id = parseJobId(jobId);
    const partIndex = parsePartIndex(id, part);

    const jobComplete = await this.ctx.store.completePart(id, partIndex);
    const timestamp = Date.now();

    this.ctx.logger.debug({ jobId: id, partIndex, jobComplete }, 'part completed');
    this.ctx.eventBus.emit({ type: 'part:completed', jobId: id, partIndex, jobComplete, timestamp });

    if (jobComplete) {
      const deleted = this.ctx.store.deleteWhenDone;
      this.ctx.logger.info({ jobId: id, deleted }, 'job completed');
      this.ctx.eventBus.emit({ type: 'job:completed', jobId: id, deleted, timestamp });
    }

    return jobComplete;
  }
}

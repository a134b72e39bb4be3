import type { TrackerContext } from '../TrackerContext.js';
import { parseJobId, parseReason } from '../validation.js';

/** Use case: flag a job as failed. Parts can still be completed afterwards. */
export class FailJob {
  constructor(private readonly ctx: TrackerContext) {}

  async execute(jobId: string, reason: string): Promise<void> {
    const id = parseJobId(jobId);
    const message = parseReason(reason);

    await this.ctx.store.failJob(id, message);

    this.ctx.logger.info({ jobId: id, reason: message }, 'job failed');
    this.ctx.eventBus.emit({ type: 'job:failed', jobId: id, reason: message, timestamp: Date.now() });
  }
}

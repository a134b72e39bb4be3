import type { TrackerContext } from '../TrackerContext.js';
import { parseJobId } from '../validation.js';

/** Use case: remove a job and everything stored for it. */
export class DeleteJob {
  constructor(private readonly ctx: TrackerContext) {}

  async execute(jobId: string): Promise<void> {
    const id = parseJobId(jobId);

    await this.ctx.store.deleteJob(id);

    this.ctx.logger.info({ jobId: id }, 'job deleted');
    this.ctx.eventBus.emit({ type: 'job:deleted', jobId: id, timestamp: Date.now() });
  }
}

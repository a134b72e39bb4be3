import type { JobMetadata } from '../../domain/model/Job.js';
import type { TrackerContext } from '../TrackerContext.js';
import { parseJobId, parseMetadata } from '../validation.js';

/** Use case: merge string annotations into a job's metadata. */
export class SetMetadata {
  constructor(private readonly ctx: TrackerContext) {}

  async execute(jobId: string, metadata: JobMetadata): Promise<void> {
    const id = parseJobId(jobId);
    const updates = parseMetadata(metadata);

    await this.ctx.store.setMetadata(id, updates);

    const keys = Object.keys(updates);
    this.ctx.logger.debug({ jobId: id, keys }, 'job metadata updated');
    this.ctx.eventBus.emit({ type: 'job:metadata-updated', jobId: id, keys, timestamp: Date.now() });
  }
}

import type { PartDescriptor } from '../../domain/model/Job.js';
import type { TrackerContext } from '../TrackerContext.js';
import { parseJobId, parseParts } from '../validation.js';

/** Use case: register a job with its parts, resetting any earlier job under the same id. */
export class RegisterJob {
  constructor(private readonly ctx: TrackerContext) {}

  async execute(jobId: string, parts: readonly PartDescriptor[]): Promise<void> {
    const id = parseJobId(jobId);
    const descriptors = parseParts(parts);

    await this.ctx.store.registerJob(id, descriptors, this.ctx.topic);

    this.ctx.logger.info({ jobId: id, totalParts: descriptors.length, topic: this.ctx.topic }, 'job registered');
    this.ctx.eventBus.emit({
      type: 'job:registered',
      jobId: id,
      totalParts: descriptors.length,
      topic: this.ctx.topic,
      timestamp: Date.now(),
    });
  }
}

import type { PartDescriptor, PendingPart } from '../../domain/model/Job.js';
import type { TrackerContext } from '../TrackerContext.js';
import { parseJobId } from '../validation.js';

/** Use case: list the parts of a job that have not been completed yet. */
export class ListPendingParts {
  constructor(private readonly ctx: TrackerContext) {}

  async execute(jobId: string): Promise<AsyncIterable<PartDescriptor>> {
    return this.ctx.store.listPendingParts(parseJobId(jobId));
  }

  async entries(jobId: string): Promise<AsyncIterable<PendingPart>> {
    return this.ctx.store.listPendingPartEntries(parseJobId(jobId));
  }
}

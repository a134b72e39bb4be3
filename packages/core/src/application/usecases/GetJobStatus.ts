import type { JobStatusSnapshot, PartStatus } from '../../domain/model/JobStatus.js';
import type { TrackerContext } from '../TrackerContext.js';
import { parseJobId, parsePartIndex } from '../validation.js';

/** Use case: query a job's progress, or whether one of its parts is complete. */
export class GetJobStatus {
  constructor(private readonly ctx: TrackerContext) {}

  async execute(jobId: string): Promise<JobStatusSnapshot> {
    return this.ctx.store.getStatus(parseJobId(jobId));
  }

  async executeForPart(jobId: string, part: number): Promise<PartStatus> {
    const id = parseJobId(jobId);
    return this.ctx.store.getPartStatus(id, parsePartIndex(id, part));
  }
}

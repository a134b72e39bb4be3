import type { JobListing, JobStatusSnapshot } from '../../domain/model/JobStatus.js';
import { isJobDoesNotExist } from '../../domain/errors.js';
import { restartable } from '../../utils/restartable.js';
import type { TrackerContext } from '../TrackerContext.js';

/**
 * Use case: enumerate jobs, optionally paired with their status.
 *
 * Each status is read separately after the job is discovered, so a listing is
 * a per-job snapshot, not a consistent view of the whole store. Jobs removed
 * in between are skipped.
 */
export class ListJobs {
  constructor(private readonly ctx: TrackerContext) {}

  ids(): AsyncIterable<string> {
    return this.ctx.store.listJobIds();
  }

  withStatus(): AsyncIterable<JobListing> {
    return restartable(() => this.pairWithStatus());
  }

  private async *pairWithStatus(): AsyncGenerator<JobListing> {
    for await (const jobId of this.ctx.store.listJobIds()) {
      const status = await this.readStatus(jobId);
      if (status) yield { jobId, status };
    }
  }

  private async readStatus(jobId: string): Promise<JobStatusSnapshot | null> {
    try {
      return await this.ctx.store.getStatus(jobId);
    } catch (err) {
      if (!isJobDoesNotExist(err)) throw err;
      this.ctx.logger.debug({ jobId }, 'job disappeared during listing');
      return null;
    }
  }
}

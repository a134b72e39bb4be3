import type { Logger } from 'pino';
import type { JobMetadata, PartDescriptor, PendingPart } from './domain/model/Job.js';
import type { JobListing, JobStatusSnapshot, PartStatus } from './domain/model/JobStatus.js';
import type { ProgressStore } from './domain/ports/ProgressStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { EventBus } from './application/EventBus.js';
import { TrackerContext } from './application/TrackerContext.js';
import { RegisterJob } from './application/usecases/RegisterJob.js';
import { CompletePart } from './application/usecases/CompletePart.js';
import { FailJob } from './application/usecases/FailJob.js';
import { SetMetadata } from './application/usecases/SetMetadata.js';
import { GetJobStatus } from './application/usecases/GetJobStatus.js';
import { ListJobs } from './application/usecases/ListJobs.js';
import { ListPendingParts } from './application/usecases/ListPendingParts.js';
import { DeleteJob } from './application/usecases/DeleteJob.js';
import { InMemoryProgressStore } from './infrastructure/state/InMemoryProgressStore.js';
import { createLogger } from './infrastructure/logging/createLogger.js';
import { loadConfig, TOPIC_ENV_VAR } from './config/loadConfig.js';
import type { ProgressLedgerConfig } from './config/loadConfig.js';

/** Configuration for a progress tracker. */
export interface ProgressTrackerConfig {
  /** Backing store shared by every worker. Default: `InMemoryProgressStore`. */
  readonly store?: ProgressStore;
  /**
   * Dispatch topic recorded on registered jobs, for correlation only.
   * Default: the `WorkTopic` environment variable.
   */
  readonly topic?: string;
  /** Logger for operations and event handler failures. Default: a pino logger at `info`. */
  readonly logger?: Logger;
}

/** Options controlling what `listJobs()` yields. */
export interface ListJobsOptions {
  /** Pair each job id with its status. Default: `true`. */
  readonly status?: boolean;
}

/** Builds the store used by `ProgressTracker.fromEnv()`. */
export type StoreFactory = (config: ProgressLedgerConfig) => ProgressStore;

/**
 * Facade over a shared `ProgressStore` for fan-out jobs.
 *
 * The job owner registers the parts once; each worker reports its part as it
 * finishes; anyone can query progress. Workers never talk to each other: all
 * coordination goes through the store.
 *
 * @example
 * ```typescript
 * const tracker = new ProgressTracker({ store });
 * await tracker.registerJob('job-42', [{ source: 'a.tif' }, { source: 'b.tif' }]);
 *
 * // in each worker, after processing part `i`
 * if (await tracker.completePart('job-42', i)) {
 *   // this worker finished the last part
 * }
 * ```
 */
export class ProgressTracker {
  private readonly ctx: TrackerContext;

  constructor(config: ProgressTrackerConfig = {}) {
    const logger = (config.logger ?? createLogger()).child({ component: 'progress-tracker' });
    this.ctx = new TrackerContext(
      config.store ?? new InMemoryProgressStore(),
      new EventBus(logger),
      logger,
      config.topic ?? process.env[TOPIC_ENV_VAR],
    );
  }

  /**
   * Build a tracker from environment variables (`WorkTopic`, `LOG_LEVEL`,
   * `PROGRESS_DELETE_WHEN_DONE`, ...). Without a factory the store is in-memory.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, createStore?: StoreFactory): ProgressTracker {
    const config = loadConfig(env);
    const store = createStore
      ? createStore(config)
      : new InMemoryProgressStore({ deleteWhenDone: config.deleteWhenDone });
    return new ProgressTracker({
      store,
      topic: config.topic,
      logger: createLogger({ level: config.logLevel }),
    });
  }

  get store(): ProgressStore {
    return this.ctx.store;
  }

  get topic(): string | undefined {
    return this.ctx.topic;
  }

  /** Register a job with one part per descriptor. Re-registering an id resets the job. */
  async registerJob(jobId: string, parts: readonly PartDescriptor[]): Promise<void> {
    return new RegisterJob(this.ctx).execute(jobId, parts);
  }

  /**
   * Mark part `part` of the job as complete. Duplicate calls are harmless.
   * @returns `true` when this call completed the job.
   */
  async completePart(jobId: string, part: number): Promise<boolean> {
    return new CompletePart(this.ctx).execute(jobId, part);
  }

  async failJob(jobId: string, reason: string): Promise<void> {
    return new FailJob(this.ctx).execute(jobId, reason);
  }

  async setMetadata(jobId: string, metadata: JobMetadata): Promise<void> {
    return new SetMetadata(this.ctx).execute(jobId, metadata);
  }

  async getStatus(jobId: string): Promise<JobStatusSnapshot> {
    return new GetJobStatus(this.ctx).execute(jobId);
  }

  async getPartStatus(jobId: string, part: number): Promise<PartStatus> {
    return new GetJobStatus(this.ctx).executeForPart(jobId, part);
  }

  /** Enumerate job ids only. */
  listJobs(options: { readonly status: false }): AsyncIterable<string>;
  /** Enumerate jobs paired with their status. */
  listJobs(options?: { readonly status?: true }): AsyncIterable<JobListing>;
  listJobs(options?: ListJobsOptions): AsyncIterable<string> | AsyncIterable<JobListing>;
  listJobs(options: ListJobsOptions = {}): AsyncIterable<string> | AsyncIterable<JobListing> {
    const useCase = new ListJobs(this.ctx);
    return options.status === false ? useCase.ids() : useCase.withStatus();
  }

  /** Pending part descriptors in index order. Rejects if the job does not exist. */
  async listPendingParts(jobId: string): Promise<AsyncIterable<PartDescriptor>> {
    return new ListPendingParts(this.ctx).execute(jobId);
  }

  /** Pending parts with their indices. Rejects if the job does not exist. */
  async listPendingPartEntries(jobId: string): Promise<AsyncIterable<PendingPart>> {
    return new ListPendingParts(this.ctx).entries(jobId);
  }

  async deleteJob(jobId: string): Promise<void> {
    return new DeleteJob(this.ctx).execute(jobId);
  }

  /** Subscribe to a specific domain event type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all domain events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe from a specific domain event type. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}

// Main entry point
export { ProgressTracker } from './ProgressTracker.js';
export type { ProgressTrackerConfig, ListJobsOptions, StoreFactory } from './ProgressTracker.js';

// Domain model
export type { JobRecord, JobMetadata, PartDescriptor, PendingPart } from './domain/model/Job.js';
export { createJobRecord, computeProgress, mergeMetadata } from './domain/model/Job.js';
export type { JobStatusSnapshot, PartStatus, JobListing } from './domain/model/JobStatus.js';
export { toStatusSnapshot } from './domain/model/JobStatus.js';
export { assertPartIndex, isPartIndex } from './domain/model/PartIndex.js';

// Errors
export {
  ProgressLedgerError,
  JobDoesNotExistError,
  InvalidPartIndexError,
  InvalidArgumentError,
  ConfigurationError,
  isJobDoesNotExist,
} from './domain/errors.js';

// Ports (for custom implementations)
export type { ProgressStore } from './domain/ports/ProgressStore.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobRegisteredEvent,
  PartCompletedEvent,
  JobCompletedEvent,
  JobFailedEvent,
  JobMetadataUpdatedEvent,
  JobDeletedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';

// Configuration and logging
export { loadConfig, TOPIC_ENV_VAR, LOG_LEVELS, DATABASE_DIALECTS } from './config/loadConfig.js';
export type { ProgressLedgerConfig, DatabaseConfig, DatabaseDialect, LogLevel } from './config/loadConfig.js';
export { createLogger } from './infrastructure/logging/createLogger.js';
export type { LoggerOptions } from './infrastructure/logging/createLogger.js';

// Helpers for store adapters
export { restartable, collect } from './utils/restartable.js';
export { isPlainObject } from './utils/isPlainObject.js';

// Built-in store
export { InMemoryProgressStore } from './infrastructure/state/InMemoryProgressStore.js';
export type { InMemoryProgressStoreOptions } from './infrastructure/state/InMemoryProgressStore.js';

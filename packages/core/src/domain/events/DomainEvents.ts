/** Emitted after `registerJob()` has written the job and its pending parts. */
export interface JobRegisteredEvent {
  readonly type: 'job:registered';
  readonly jobId: string;
  readonly totalParts: number;
  readonly topic?: string;
  readonly timestamp: number;
}

/** Emitted for every `completePart()` call that resolved, duplicates included. */
export interface PartCompletedEvent {
  readonly type: 'part:completed';
  readonly jobId: string;
  readonly partIndex: number;
  /** `true` only for the call that completed the job. */
  readonly jobComplete: boolean;
  readonly timestamp: number;
}

/** Emitted once per job, when the last pending part is completed. */
export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  /** `true` when the store removed the job as part of completing it. */
  readonly deleted: boolean;
  readonly timestamp: number;
}

/** Emitted after `failJob()`. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted after `setMetadata()` with the keys that were written. */
export interface JobMetadataUpdatedEvent {
  readonly type: 'job:metadata-updated';
  readonly jobId: string;
  readonly keys: readonly string[];
  readonly timestamp: number;
}

/** Emitted after `deleteJob()`, whether or not the job existed. */
export interface JobDeletedEvent {
  readonly type: 'job:deleted';
  readonly jobId: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JobRegisteredEvent
  | PartCompletedEvent
  | JobCompletedEvent
  | JobFailedEvent
  | JobMetadataUpdatedEvent
  | JobDeletedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

import type { Logger } from 'pino';
import type { ProgressStore } from '../domain/ports/ProgressStore.js';
import type { EventBus } from './EventBus.js';

/** Collaborators shared by every use case behind a `ProgressTracker`. */
export class TrackerContext {
  constructor(
    readonly store: ProgressStore,
    readonly eventBus: EventBus,
    readonly logger: Logger,
    /** Topic recorded on jobs registered through this tracker. */
    readonly topic: string | undefined,
  ) {}
}

import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import { createLogger } from '../../../src/infrastructure/logging/createLogger.js';
import type { JobRegisteredEvent, PartCompletedEvent } from '../../../src/domain/events/DomainEvents.js';

function registered(jobId = 'test-job'): JobRegisteredEvent {
  return { type: 'job:registered', jobId, totalParts: 3, timestamp: Date.now() };
}

describe('EventBus', () => {
  const silent = createLogger({ level: 'silent' });

  it('should emit events to registered handlers', () => {
    const bus = new EventBus(silent);
    const handler = vi.fn();

    bus.on('job:registered', handler);

    const event = registered();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus(silent);
    const handler = vi.fn();

    bus.on('job:registered', handler);

    const event: PartCompletedEvent = {
      type: 'part:completed',
      jobId: 'test-job',
      partIndex: 0,
      jobComplete: false,
      timestamp: Date.now(),
    };

    bus.emit(event);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus(silent);
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('job:registered', handler1);
    bus.on('job:registered', handler2);

    bus.emit(registered());
    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus(silent);
    const handler = vi.fn();

    bus.on('job:registered', handler);
    bus.off('job:registered', handler);

    bus.emit(registered());
    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver every event to wildcard handlers until removed', () => {
    const bus = new EventBus(silent);
    const handler = vi.fn();

    bus.onAny(handler);
    bus.emit(registered('a'));
    bus.emit({ type: 'job:deleted', jobId: 'a', timestamp: 1 });
    bus.offAny(handler);
    bus.emit(registered('b'));

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenLastCalledWith({ type: 'job:deleted', jobId: 'a', timestamp: 1 });
  });

  it('should keep calling handlers after one throws and log the failure', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', destination: { write: (line: string) => lines.push(line) } });
    const bus = new EventBus(logger);
    const after = vi.fn();
    const wildcard = vi.fn();

    bus.on('job:registered', () => {
      throw new Error('subscriber broke');
    });
    bus.on('job:registered', after);
    bus.onAny(wildcard);

    bus.emit(registered('job-7'));

    expect(after).toHaveBeenCalledOnce();
    expect(wildcard).toHaveBeenCalledOnce();
    expect(lines).toHaveLength(1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '{}');
    expect(entry['msg']).toBe('event handler threw');
    expect(entry['eventType']).toBe('job:registered');
    expect(entry['jobId']).toBe('job-7');
  });
});

import { describe, it, expect } from 'vitest';
import { computeProgress, createJobRecord, mergeMetadata } from '../../../src/domain/model/Job.js';
import { toStatusSnapshot } from '../../../src/domain/model/JobStatus.js';

describe('Job model', () => {
  describe('createJobRecord', () => {
    it('should start with every part remaining and no failure', () => {
      expect(createJobRecord('job-1', 4, 'work-topic', 1700000000000)).toEqual({
        jobId: 'job-1',
        total: 4,
        remaining: 4,
        failed: false,
        metadata: {},
        topic: 'work-topic',
        registeredAt: 1700000000000,
      });
    });
  });

  describe('computeProgress', () => {
    it('should be the completed fraction', () => {
      expect(computeProgress(3, 3)).toBe(0);
      expect(computeProgress(3, 2)).toBe(1 / 3);
      expect(computeProgress(4, 1)).toBe(0.75);
      expect(computeProgress(3, 0)).toBe(1);
    });

    it('should be zero for a job without parts', () => {
      expect(computeProgress(0, 0)).toBe(0);
    });
  });

  describe('mergeMetadata', () => {
    it('should overwrite named keys and keep the rest', () => {
      expect(mergeMetadata({ a: '1', b: '2' }, { b: '3', c: '4' })).toEqual({ a: '1', b: '3', c: '4' });
    });
  });

  describe('toStatusSnapshot', () => {
    it('should omit the optional fields when they are not set', () => {
      const snapshot = toStatusSnapshot(createJobRecord('job-1', 2, undefined, 1));

      expect(snapshot).toEqual({ jobId: 'job-1', total: 2, remaining: 2, progress: 0, failed: false, metadata: {} });
      expect('topic' in snapshot).toBe(false);
      expect('failureReason' in snapshot).toBe(false);
    });

    it('should carry failure and topic when present', () => {
      const record = { ...createJobRecord('job-1', 2, 'work-topic', 1), remaining: 1, failed: true, failureReason: 'boom' };

      expect(toStatusSnapshot(record)).toEqual({
        jobId: 'job-1',
        total: 2,
        remaining: 1,
        progress: 0.5,
        failed: true,
        failureReason: 'boom',
        metadata: {},
        topic: 'work-topic',
      });
    });
  });
});

import { describe, it, expect } from 'vitest';
import { assertPartIndex, isPartIndex } from '../../../src/domain/model/PartIndex.js';
import { InvalidPartIndexError } from '../../../src/domain/errors.js';

describe('PartIndex', () => {
  it('should accept non-negative integers', () => {
    expect(isPartIndex(0)).toBe(true);
    expect(isPartIndex(12)).toBe(true);
  });

  it('should reject negative, fractional and non-finite values', () => {
    expect(isPartIndex(-1)).toBe(false);
    expect(isPartIndex(0.5)).toBe(false);
    expect(isPartIndex(Number.NaN)).toBe(false);
    expect(isPartIndex(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('should check the upper bound when the total is known', () => {
    expect(() => assertPartIndex('job-1', 2, 3)).not.toThrow();
    expect(() => assertPartIndex('job-1', 3, 3)).toThrow(InvalidPartIndexError);
    expect(() => assertPartIndex('job-1', 3, 3)).toThrow("Part index 3 is out of range for job 'job-1' (3 parts)");
  });

  it('should describe a malformed index without a total', () => {
    expect(() => assertPartIndex('job-1', -2)).toThrow("Part index -2 for job 'job-1' must be a non-negative integer");
  });
});

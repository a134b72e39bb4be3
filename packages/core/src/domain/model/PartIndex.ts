import { InvalidPartIndexError } from '../errors.js';

export function isPartIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0;
}

/**
 * Throws `InvalidPartIndexError` unless `index` addresses one of the job's parts.
 * Pass `total` to check the upper bound as well.
 */
export function assertPartIndex(jobId: string, index: number, total?: number): void {
  if (!isPartIndex(index)) {
    throw new InvalidPartIndexError(jobId, index);
  }
  if (total !== undefined && index >= total) {
    throw new InvalidPartIndexError(jobId, index, total);
  }
}

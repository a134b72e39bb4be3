import { describe, it, expect } from 'vitest';
import {
  ProgressLedgerError,
  JobDoesNotExistError,
  InvalidPartIndexError,
  InvalidArgumentError,
  isJobDoesNotExist,
} from '../../../src/domain/errors.js';

describe('errors', () => {
  it('should expose a stable code and the job id', () => {
    const error = new JobDoesNotExistError('job-9');

    expect(error).toBeInstanceOf(ProgressLedgerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('JOB_DOES_NOT_EXIST');
    expect(error.jobId).toBe('job-9');
    expect(error.name).toBe('JobDoesNotExistError');
    expect(error.message).toBe("Job 'job-9' does not exist");
  });

  it('should keep the offending index and total', () => {
    const error = new InvalidPartIndexError('job-9', 5, 3);

    expect(error.code).toBe('INVALID_PART_INDEX');
    expect(error.partIndex).toBe(5);
    expect(error.total).toBe(3);
  });

  it('should join validation issues into the message', () => {
    const error = new InvalidArgumentError(['jobId: must not be empty', 'parts: must be an array of objects']);

    expect(error.message).toBe('Invalid argument: jobId: must not be empty; parts: must be an array of objects');
  });

  it('should recognise only JobDoesNotExistError', () => {
    expect(isJobDoesNotExist(new JobDoesNotExistError('x'))).toBe(true);
    expect(isJobDoesNotExist(new InvalidPartIndexError('x', -1))).toBe(false);
    expect(isJobDoesNotExist(new Error("Job 'x' does not exist"))).toBe(false);
  });
});

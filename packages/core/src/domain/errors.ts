/** Base class for every error raised by the ledger itself. Store transport errors are never wrapped. */
export abstract class ProgressLedgerError extends Error {
  abstract readonly code: string;
}

/** The job has no record: never registered, deleted, or removed on completion. */
export class JobDoesNotExistError extends ProgressLedgerError {
  readonly code = 'JOB_DOES_NOT_EXIST';

  constructor(readonly jobId: string) {
    super(`Job '${jobId}' does not exist`);
    this.name = 'JobDoesNotExistError';
  }
}

/** A part index that is negative, fractional, or outside `[0, total)`. */
export class InvalidPartIndexError extends ProgressLedgerError {
  readonly code = 'INVALID_PART_INDEX';

  constructor(
    readonly jobId: string,
    readonly partIndex: number,
    readonly total?: number,
  ) {
    super(
      total === undefined
        ? `Part index ${String(partIndex)} for job '${jobId}' must be a non-negative integer`
        : `Part index ${String(partIndex)} is out of range for job '${jobId}' (${String(total)} parts)`,
    );
    this.name = 'InvalidPartIndexError';
  }
}

export class InvalidArgumentError extends ProgressLedgerError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid argument: ${issues.join('; ')}`);
    this.name = 'InvalidArgumentError';
  }
}

export class ConfigurationError extends ProgressLedgerError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export function isJobDoesNotExist(error: unknown): error is JobDoesNotExistError {
  return error instanceof JobDoesNotExistError;
}

import { z } from 'zod';
import type { JobMetadata, PartDescriptor } from '../domain/model/Job.js';
import { InvalidArgumentError } from '../domain/errors.js';
import { assertPartIndex } from '../domain/model/PartIndex.js';

const jobIdSchema = z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty');

const partsSchema = z.array(z.record(z.unknown()), { invalid_type_error: 'must be an array of objects' });

const metadataSchema = z.record(z.string({ invalid_type_error: 'values must be strings' }));

const reasonSchema = z.string({ invalid_type_error: 'must be a string' });

function parseArgument<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(
      result.error.issues.map((issue) => {
        const path = [label, ...issue.path.map(String)].join('.');
        return `${path}: ${issue.message}`;
      }),
    );
  }
  return result.data;
}

export function parseJobId(value: unknown): string {
  return parseArgument(jobIdSchema, value, 'jobId');
}

export function parseParts(value: unknown): PartDescriptor[] {
  return parseArgument(partsSchema, value, 'parts');
}

export function parseMetadata(value: unknown): JobMetadata {
  return parseArgument(metadataSchema, value, 'metadata');
}

export function parseReason(value: unknown): string {
  return parseArgument(reasonSchema, value, 'reason');
}

/** Reject indices that could never be valid, before the store checks the upper bound. */
export function parsePartIndex(jobId: string, value: unknown): number {
  if (typeof value !== 'number') {
    throw new InvalidArgumentError([`part: must be a number, got ${typeof value}`]);
  }
  assertPartIndex(jobId, value);
  return value;
}

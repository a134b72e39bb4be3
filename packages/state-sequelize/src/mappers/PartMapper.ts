import type { PartDescriptor, PendingPart } from '@fanout-ledger/core';
import { isPlainObject } from '@fanout-ledger/core';
import type { PartRow } from '../models/PartModel.js';
import { parseJson } from '../utils/parseJson.js';

export function toRows(jobId: string, parts: readonly PartDescriptor[]): PartRow[] {
  return parts.map((descriptor, partIndex) => ({ jobId, partIndex, descriptor }));
}

export function toDomain(row: PartRow): PendingPart {
  const descriptor = parseJson(row.descriptor);
  if (!isPlainObject(descriptor)) {
    throw new Error(`Part ${String(row.partIndex)} of job '${row.jobId}' has a malformed descriptor`);
  }
  return { index: Number(row.partIndex), descriptor };
}

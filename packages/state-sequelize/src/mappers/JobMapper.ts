import type { JobMetadata, JobRecord } from '@fanout-ledger/core';
import { isPlainObject } from '@fanout-ledger/core';
import type { JobRow } from '../models/JobModel.js';
import { parseJson } from '../utils/parseJson.js';

export function toRow(record: JobRecord): JobRow {
  return {
    id: record.jobId,
    total: record.total,
    remaining: record.remaining,
    failed: record.failed,
    failureReason: record.failureReason ?? null,
    metadata: record.metadata,
    topic: record.topic ?? null,
    registeredAt: record.registeredAt,
  };
}

export function toDomain(row: JobRow): JobRecord {
  const base: JobRecord = {
    jobId: row.id,
    total: Number(row.total),
    remaining: Number(row.remaining),
    failed: Boolean(row.failed),
    metadata: toMetadata(parseJson(row.metadata)),
    registeredAt: Number(row.registeredAt),
  };

  return {
    ...base,
    ...(row.failureReason !== null ? { failureReason: row.failureReason } : {}),
    ...(row.topic !== null ? { topic: row.topic } : {}),
  };
}

function toMetadata(value: unknown): JobMetadata {
  if (!isPlainObject(value)) return {};

  const metadata: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') metadata[key] = entry;
  }
  return metadata;
}

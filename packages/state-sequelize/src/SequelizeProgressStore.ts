import { Op } from 'sequelize';
import type { Model, Sequelize, Transaction, WhereOptions } from 'sequelize';
import type {
  JobMetadata,
  JobRecord,
  JobStatusSnapshot,
  PartDescriptor,
  PartStatus,
  PendingPart,
  ProgressStore,
} from '@fanout-ledger/core';
import {
  JobDoesNotExistError,
  assertPartIndex,
  createJobRecord,
  mergeMetadata,
  restartable,
  toStatusSnapshot,
} from '@fanout-ledger/core';
import { defineJobModel } from './models/JobModel.js';
import type { JobModel, JobRow } from './models/JobModel.js';
import { definePartModel } from './models/PartModel.js';
import type { PartModel, PartRow } from './models/PartModel.js';
import * as JobMapper from './mappers/JobMapper.js';
import * as PartMapper from './mappers/PartMapper.js';

export interface SequelizeProgressStoreOptions {
  /** Delete a job in the same transaction that completes it. Default: `false`. */
  readonly deleteWhenDone?: boolean;
  /** Prefix for both table names. Default: `fanout_`. */
  readonly tablePrefix?: string;
  /** Rows fetched per query when enumerating jobs or pending parts. Default: `100`. */
  readonly pageSize?: number;
}

const DEFAULT_TABLE_PREFIX = 'fanout_';
const DEFAULT_PAGE_SIZE = 100;
const INSERT_CHUNK_SIZE = 500;

interface JobCursor {
  readonly registeredAt: number;
  readonly id: string;
}

/**
 * Sequelize-based ProgressStore adapter for `@fanout-ledger/core`.
 *
 * Keeps one row per job in `<prefix>jobs` and one row per pending part in
 * `<prefix>parts`. Works with any dialect Sequelize v6 supports (PostgreSQL,
 * MySQL, MariaDB, SQLite, MS SQL Server).
 *
 * `completePart()` runs in a transaction that locks the job row
 * (`SELECT ... FOR UPDATE` where the dialect has it), deletes the pending part
 * and decrements `remaining` in SQL only if that delete removed a row.
 *
 * The store never opens its own connection. Call `initialize()` after
 * construction to create tables.
 */
export class SequelizeProgressStore implements ProgressStore {
  readonly deleteWhenDone: boolean;
  private readonly sequelize: Sequelize;
  private readonly Job: JobModel;
  private readonly Part: PartModel;
  private readonly pageSize: number;

  constructor(sequelize: Sequelize, options: SequelizeProgressStoreOptions = {}) {
    const prefix = options.tablePrefix ?? DEFAULT_TABLE_PREFIX;
    this.sequelize = sequelize;
    this.deleteWhenDone = options.deleteWhenDone ?? false;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.Job = defineJobModel(sequelize, `${prefix}jobs`);
    this.Part = definePartModel(sequelize, `${prefix}parts`);
  }

  async initialize(): Promise<void> {
    await this.Job.sync();
    await this.Part.sync();
  }

  async registerJob(jobId: string, parts: readonly PartDescriptor[], topic?: string): Promise<void> {
    const row = JobMapper.toRow(createJobRecord(jobId, parts.length, topic));
    const partRows = PartMapper.toRows(jobId, parts);

    await this.sequelize.transaction(async (transaction) => {
      await this.destroyJob(jobId, transaction);
      await this.Job.create({ ...row }, { transaction });
      for (let start = 0; start < partRows.length; start += INSERT_CHUNK_SIZE) {
        await this.Part.bulkCreate(partRows.slice(start, start + INSERT_CHUNK_SIZE), { transaction });
      }
    });
  }

  async completePart(jobId: string, index: number): Promise<boolean> {
    return await this.sequelize.transaction(async (transaction) => {
      const row = await this.lockJob(jobId, transaction);
      assertPartIndex(jobId, index, JobMapper.toDomain(toJobRow(row)).total);

      const removed = await this.Part.destroy({ where: { jobId, partIndex: index }, transaction });
      if (removed === 0) return false;

      await row.decrement('remaining', { transaction });
      await row.reload({ transaction });
      if (JobMapper.toDomain(toJobRow(row)).remaining > 0) return false;

      if (this.deleteWhenDone) {
        await this.destroyJob(jobId, transaction);
      }
      return true;
    });
  }

  async failJob(jobId: string, reason: string): Promise<void> {
    await this.sequelize.transaction(async (transaction) => {
      await this.lockJob(jobId, transaction);
      await this.Job.update({ failed: true, failureReason: reason }, { where: { id: jobId }, transaction });
    });
  }

  async setMetadata(jobId: string, metadata: JobMetadata): Promise<void> {
    await this.sequelize.transaction(async (transaction) => {
      const row = await this.lockJob(jobId, transaction);
      const current = JobMapper.toDomain(toJobRow(row)).metadata;
      await this.Job.update(
        { metadata: mergeMetadata(current, metadata) },
        { where: { id: jobId }, transaction },
      );
    });
  }

  async getStatus(jobId: string): Promise<JobStatusSnapshot> {
    return toStatusSnapshot(await this.requireJob(jobId));
  }

  async getPartStatus(jobId: string, index: number): Promise<PartStatus> {
    return await this.sequelize.transaction(async (transaction) => {
      const row = await this.lockJob(jobId, transaction);
      assertPartIndex(jobId, index, JobMapper.toDomain(toJobRow(row)).total);

      const pending = await this.Part.count({ where: { jobId, partIndex: index }, transaction });
      return { jobId, part: index, complete: pending === 0 };
    });
  }

  listJobIds(): AsyncIterable<string> {
    return restartable(() => this.scanJobIds());
  }

  async listPendingParts(jobId: string): Promise<AsyncIterable<PartDescriptor>> {
    await this.requireJob(jobId);
    return restartable(() => this.scanPendingDescriptors(jobId));
  }

  async listPendingPartEntries(jobId: string): Promise<AsyncIterable<PendingPart>> {
    await this.requireJob(jobId);
    return restartable(() => this.scanPendingParts(jobId));
  }

  async deleteJob(jobId: string): Promise<void> {
    await this.sequelize.transaction(async (transaction) => {
      await this.destroyJob(jobId, transaction);
    });
  }

  private async requireJob(jobId: string): Promise<JobRecord> {
    const row = await this.Job.findByPk(jobId);
    if (!row) throw new JobDoesNotExistError(jobId);
    return JobMapper.toDomain(toJobRow(row));
  }

  private async lockJob(jobId: string, transaction: Transaction): Promise<Model> {
    const row = await this.Job.findByPk(jobId, { transaction, lock: true });
    if (!row) throw new JobDoesNotExistError(jobId);
    return row;
  }

  private async destroyJob(jobId: string, transaction: Transaction): Promise<void> {
    await this.Part.destroy({ where: { jobId }, transaction });
    await this.Job.destroy({ where: { id: jobId }, transaction });
  }

  private async *scanJobIds(): AsyncGenerator<string> {
    let cursor: JobCursor | undefined;

    for (;;) {
      const rows = await this.Job.findAll({
        attributes: ['id', 'registeredAt'],
        where: cursor ? after(cursor) : {},
        order: [
          ['registeredAt', 'ASC'],
          ['id', 'ASC'],
        ],
        limit: this.pageSize,
      });

      for (const row of rows) {
        const plain = toJobRow(row);
        cursor = { registeredAt: Number(plain.registeredAt), id: plain.id };
        yield plain.id;
      }

      if (rows.length < this.pageSize) return;
    }
  }

  private async *scanPendingParts(jobId: string): AsyncGenerator<PendingPart> {
    let lastIndex = -1;

    for (;;) {
      const rows = await this.Part.findAll({
        where: { jobId, partIndex: { [Op.gt]: lastIndex } },
        order: [['partIndex', 'ASC']],
        limit: this.pageSize,
      });

      for (const row of rows) {
        const part = PartMapper.toDomain(toPartRow(row));
        lastIndex = part.index;
        yield part;
      }

      if (rows.length < this.pageSize) return;
    }
  }

  private async *scanPendingDescriptors(jobId: string): AsyncGenerator<PartDescriptor> {
    for await (const part of this.scanPendingParts(jobId)) {
      yield part.descriptor;
    }
  }
}

function after(cursor: JobCursor): WhereOptions {
  return {
    [Op.or]: [
      { registeredAt: { [Op.gt]: cursor.registeredAt } },
      { registeredAt: cursor.registeredAt, id: { [Op.gt]: cursor.id } },
    ],
  };
}

function toJobRow(row: Model): JobRow {
  const plain: JobRow = row.get({ plain: true });
  return plain;
}

function toPartRow(row: Model): PartRow {
  const plain: PartRow = row.get({ plain: true });
  return plain;
}

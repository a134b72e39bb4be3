import { describe, it, expect, afterEach } from 'vitest';
import type { Sequelize } from 'sequelize';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { createLogger } from '@fanout-ledger/core';
import type { LogLevel } from '@fanout-ledger/core';
import { createSequelize } from '../../src/createSequelize.js';
import { BetterSqliteDriver } from '../better-sqlite3-driver.js';

describe('createSequelize', () => {
  let sequelize: Sequelize | undefined;
  let dbPath: string;

  afterEach(async () => {
    await sequelize?.close();
    sequelize = undefined;
    fs.rmSync(dbPath, { force: true });
  });

  function open(level: LogLevel): string[] {
    const lines: string[] = [];
    dbPath = path.join(os.tmpdir(), `fanout-log-${String(Date.now())}-${String(Math.random())}.sqlite`);
    sequelize = createSequelize(
      { dialect: 'sqlite', host: 'localhost', database: 'fanout_ledger', storage: dbPath },
      {
        logger: createLogger({ level, destination: { write: (line: string) => void lines.push(line) } }),
        options: { dialectModule: { Database: BetterSqliteDriver } },
      },
    );
    return lines;
  }

  it('should log every statement at debug', async () => {
    const lines = open('debug');

    await sequelize?.authenticate();

    const entries: Array<Record<string, unknown>> = lines.map((line) => JSON.parse(line));
    const query = entries.find((entry) => String(entry['sql']).includes('SELECT 1+1'));
    expect(query?.['level']).toBe(20);
    expect(query?.['msg']).toBe('sequelize query');
    expect(query?.['component']).toBe('sequelize');
    expect(query?.['sql']).toMatch(/SELECT 1\+1 AS result$/);
  });

  it('should stay quiet above debug', async () => {
    const lines = open('info');

    await sequelize?.authenticate();

    expect(lines).toEqual([]);
  });
});

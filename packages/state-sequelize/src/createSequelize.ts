import { Sequelize } from 'sequelize';
import type { Options } from 'sequelize';
import type { Logger } from 'pino';
import type { DatabaseConfig } from '@fanout-ledger/core';
import { createLogger } from '@fanout-ledger/core';

export interface CreateSequelizeOptions {
  /** Receives every SQL statement at `debug`. Default: a pino logger at `info`. */
  readonly logger?: Logger;
  /** Extra Sequelize options such as `pool` or `dialectModule`. Applied last. */
  readonly options?: Options;
}

/**
 * Build a Sequelize handle from `loadConfig().database`.
 *
 * The caller owns the handle and closes it; `SequelizeProgressStore` only
 * borrows it.
 */
export function createSequelize(config: DatabaseConfig, { logger, options }: CreateSequelizeOptions = {}): Sequelize {
  const sqlLogger = (logger ?? createLogger()).child({ component: 'sequelize' });

  return new Sequelize({
    dialect: config.dialect,
    host: config.host,
    port: config.port,
    database: config.database,
    username: config.username,
    password: config.password,
    storage: config.storage,
    logging: (sql: string) => {
      sqlLogger.debug({ sql }, 'sequelize query');
    },
    ...options,
  });
}

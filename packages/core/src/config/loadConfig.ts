import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';

/** Environment variable holding the dispatch topic jobs are correlated with. */
export const TOPIC_ENV_VAR = 'WorkTopic';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DATABASE_DIALECTS = ['postgres', 'mysql', 'mariadb', 'sqlite', 'mssql'] as const;
export type DatabaseDialect = (typeof DATABASE_DIALECTS)[number];

const DEFAULT_PORTS: Readonly<Record<DatabaseDialect, number | undefined>> = {
  postgres: 5432,
  mysql: 3306,
  mariadb: 3306,
  mssql: 1433,
  sqlite: undefined,
};

/** Connection settings for a relational backing store. */
export interface DatabaseConfig {
  readonly dialect: DatabaseDialect;
  readonly host: string;
  readonly port?: number;
  readonly database: string;
  readonly username?: string;
  readonly password?: string;
  /** SQLite file path. Ignored by other dialects. */
  readonly storage?: string;
}

export interface ProgressLedgerConfig {
  readonly topic?: string;
  readonly deleteWhenDone: boolean;
  readonly logLevel: LogLevel;
  readonly database: DatabaseConfig;
}

const booleanString = z
  .union([z.enum(['true', 'false']), z.undefined()])
  .transform((value) => value === 'true');

const envSchema = z.object({
  [TOPIC_ENV_VAR]: z.string().min(1, `${TOPIC_ENV_VAR} must not be empty`).optional(),
  PROGRESS_DELETE_WHEN_DONE: booleanString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PROGRESS_DB_DIALECT: z.enum(DATABASE_DIALECTS).default('postgres'),
  PROGRESS_DB_HOST: z.string().min(1, 'PROGRESS_DB_HOST must not be empty').default('localhost'),
  PROGRESS_DB_PORT: z.coerce
    .number({ invalid_type_error: 'PROGRESS_DB_PORT must be a number' })
    .int('PROGRESS_DB_PORT must be an integer')
    .positive('PROGRESS_DB_PORT must be greater than 0')
    .optional(),
  PROGRESS_DB_NAME: z.string().min(1, 'PROGRESS_DB_NAME must not be empty').default('fanout_ledger'),
  PROGRESS_DB_USER: z.string().optional(),
  PROGRESS_DB_PASSWORD: z.string().optional(),
  PROGRESS_DB_STORAGE: z.string().optional(),
});

/** Read ledger settings from the environment, applying defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProgressLedgerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new ConfigurationError(issues);
  }

  const parsed = result.data;
  const dialect = parsed.PROGRESS_DB_DIALECT;

  return Object.freeze({
    topic: parsed[TOPIC_ENV_VAR],
    deleteWhenDone: parsed.PROGRESS_DELETE_WHEN_DONE,
    logLevel: parsed.LOG_LEVEL,
    database: Object.freeze({
      dialect,
      host: parsed.PROGRESS_DB_HOST,
      port: parsed.PROGRESS_DB_PORT ?? DEFAULT_PORTS[dialect],
      database: parsed.PROGRESS_DB_NAME,
      username: parsed.PROGRESS_DB_USER,
      password: parsed.PROGRESS_DB_PASSWORD,
      storage: parsed.PROGRESS_DB_STORAGE,
    }),
  });
}

import { pino } from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';
import { LOG_LEVELS } from '../../config/loadConfig.js';

export interface LoggerOptions {
  /** Minimum level to emit. Default: `LOG_LEVEL` from the environment, else `'info'`. */
  readonly level?: LevelWithSilent;
  /** Value of the `name` field on every line. Default: `'fanout-ledger'`. */
  readonly name?: string;
  /** Where to write. Default: stdout. */
  readonly destination?: DestinationStream;
}

function levelFromEnv(): LevelWithSilent {
  const value = process.env['LOG_LEVEL'];
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

/** Build the structured JSON logger used across the ledger. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    name: options.name ?? 'fanout-ledger',
    level: options.level ?? levelFromEnv(),
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

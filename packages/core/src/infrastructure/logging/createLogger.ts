import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export interface LoggerOptions {
  /** Default: `'info'`. */
  readonly level?: LevelWithSilent;
  /** Pretty-print through `pino-pretty` instead of emitting JSON lines. Default: `false`. */
  readonly pretty?: boolean;
  /** Logger name shown on every line. */
  readonly name?: string;
}

/** Create the process logger. Build it once at start-up and pass it to every component. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name,
    level: options.level ?? 'info',
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:yyyy-mm-dd HH:MM:ss', ignore: 'pid,hostname' },
        }
      : undefined,
  });
}

/** Logger that discards everything. Used when a component is built without one. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

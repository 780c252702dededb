import chalk from 'chalk';
import type { Logger } from '../config/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export interface ComponentLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** Level from `PGFIXTURE_LOG_LEVEL`, `warn` when unset or unrecognised. */
export function levelFromEnvironment(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = (env.PGFIXTURE_LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(level) ? level : 'warn';
}

/**
 * Leveled logger for one component. Lines go to stderr so they never mix
 * with output a CLI command prints for consumption.
 */
export function createLogger(
  component: string,
  level: LogLevel = levelFromEnvironment(),
  write: (line: string) => void = line => console.error(line)
): ComponentLogger {
  const emit = (at: Exclude<LogLevel, 'silent'>, paint: (text: string) => string, message: string) => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    write(paint(`[${component}] ${message}`));
  };

  return {
    debug: message => emit('debug', chalk.gray, message),
    info: message => emit('info', chalk.cyan, message),
    warn: message => emit('warn', chalk.yellow, message),
    error: message => emit('error', chalk.red, message),
  };
}

/** The plan's default diagnostic logger: one line per event on stdout. */
export const defaultPlanLogger: Logger = line => {
  console.log(line);
};

import type { Logger as PinoLogger } from 'pino';

/**
 * Components log through pino directly (data-first):
 *   logger.info({ runId }, 'Run started');
 *   logger.warn({ err: error, phase }, 'Validator call failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger bound to `{ component }`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVEL_ENV = 'MARKUP_REPAIR_LOG_LEVEL';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads the level from the environment. Unset or unrecognised values mean `silent`:
 * the pipeline is embedded in host processes that own their own output.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}

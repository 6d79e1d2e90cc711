export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { resolveLogLevel, isLogLevel, LOG_LEVEL_ENV } from './types.js';

export { PinoLoggerFactory } from './create-logger.js';

export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';

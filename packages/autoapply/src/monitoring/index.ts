export { Logger, getLogger, redactObject } from './logger.js';
export type { LogLevel, LogEntry, LoggerOptions } from './logger.js';

export type { LogLevel, LogEntry, LogSink } from './logger.js';
export { Logger, getLogger, redact } from './logger.js';

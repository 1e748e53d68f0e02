// Public API of the safety review engine

export * from './models/index.js';
export * from './services/index.js';
export * from './core/errors.js';
export * from './core/integrity.js';
export { Logger, LogLevel, logger, parseLogLevel } from './core/logger.js';
export type { LoggerConfig, LogSink } from './core/logger.js';

// Task Planner public API

export * from './models/index.js';
export * from './core/errors.js';
export * from './core/schemas.js';
export * from './core/validation.js';
export { Logger, LogLevel, logger, toLogLevel, type LogLevelName, type LoggerConfig } from './core/logger.js';
export * from './services/index.js';

/**
 * Utilities Module
 */

// Type-only exports (interfaces)
export type { Logger, LogContext, LogLevel, LogSink } from './logger.js';

// Value exports (classes and functions)
export { JsonLogger, createLogger, isLogLevel } from './logger.js';

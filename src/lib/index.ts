/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createLogger } from './logger.js';
export type { Logger, LogLevel, LogFields } from './logger.js';
export { loadConfig, ConfigError, DEFAULT_ALLOWED_FILE_TYPES } from './config.js';
export type { AppConfig, RemoteConfig } from './config.js';
export { ReadWriteLock } from './rw-lock.js';
export { createDeadline, sleep, DeadlineExceededError } from './deadline.js';
export type { Deadline } from './deadline.js';

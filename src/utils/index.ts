/**
 * Utilities barrel export
 */

export * from './async-queue.js';
export * from './config-loader.js';
export * from './config-schemas.js';
export * from './debounced-task.js';
export * from './disk-space.js';
export * from './errors.js';
export * from './persistent-store.js';
export * from './retry.js';
export * from './semaphore.js';
export { Logger, configureLogger, logger, type LogContext, type LoggerConfig } from './logger.js';

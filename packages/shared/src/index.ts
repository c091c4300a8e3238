export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export { withRetry, isRetryableError, sleep, type RetryOptions } from './retry.js';

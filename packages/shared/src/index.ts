export * from './types.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export { hashString, pickBySeed } from './hash.js';
export { withRetry, isRetryableError, type RetryOptions } from './retry.js';

/**
 * Resilience components - public exports.
 */

export {
  RetryHooks,
  RetryExecutor,
  SleepFunction,
  createRetryExecutor,
} from './retry.js';

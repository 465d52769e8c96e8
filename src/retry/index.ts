/**
 * Retry module.
 *
 * @module retry
 */

export { RetryDecision, defaultSleep, type Sleep } from './types.js';
export {
  translateRetryConfig,
  ServiceRetryConfig,
  RetryRulesSchema,
  type RetryCondition,
  type RetryDelay,
  type RetryRules,
  type RetrySection,
} from './config.js';
export {
  createRetryHandler,
  computeDelayMs,
  conditionMatches,
  retryHandlerId,
  type RetryHandlerOptions,
} from './handler.js';

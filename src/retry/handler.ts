/**
 * `needs-retry` handler built from a service retry configuration.
 *
 * @module retry/handler
 */

import type { EventHandler, EventPayloads } from '../events/types.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { RetryCondition, RetryDelay, ServiceRetryConfig } from './config.js';
import { RetryDecision } from './types.js';

/**
 * Handler id a creator registers the retry handler under.
 */
export function retryHandlerId(endpointPrefix: string): string {
  return `retry-config-${endpointPrefix}`;
}

/**
 * Delay before the next attempt, in milliseconds.
 *
 * `base * growthFactor ^ (attempt - 1)` seconds, where `attempt` is the
 * number of the attempt that just failed. A `rand` base draws from [0, 1).
 */
export function computeDelayMs(delay: RetryDelay, attempt: number, random: () => number = Math.random): number {
  const base = delay.base === 'rand' ? random() : delay.base;
  return Math.round(base * delay.growthFactor ** (attempt - 1) * 1000);
}

/**
 * Whether a condition matches the outcome of an attempt.
 */
export function conditionMatches(
  condition: RetryCondition,
  outcome: Pick<EventPayloads['needs-retry'], 'response' | 'error'>
): boolean {
  if ('socketErrors' in condition) {
    return outcome.error !== undefined && condition.socketErrors.includes(outcome.error.reason);
  }
  const response = outcome.response;
  if (!response) {
    return false;
  }
  const { serviceErrorCode, httpStatusCode } = condition.response;
  if (serviceErrorCode !== undefined && response.parsed.error?.code !== serviceErrorCode) {
    return false;
  }
  if (httpStatusCode !== undefined && response.http.status !== httpStatusCode) {
    return false;
  }
  return true;
}

export interface RetryHandlerOptions {
  logger?: Logger;
  /** Source of randomness for `rand` delay bases */
  random?: () => number;
}

/**
 * Create the `needs-retry` handler for a service.
 *
 * Answers `retry` when a policy matches and attempts remain, `give-up` when a
 * policy matches but the budget is spent, and nothing otherwise.
 *
 * @example
 * ```typescript
 * const config = translateRetryConfig(rules, 'widgets');
 * events.register(
 *   { event: 'needs-retry', service: 'widgets' },
 *   createRetryHandler(config),
 *   retryHandlerId('widgets')
 * );
 * ```
 */
export function createRetryHandler(
  config: ServiceRetryConfig,
  options: RetryHandlerOptions = {}
): EventHandler<'needs-retry'> {
  const logger = options.logger ?? new NoopLogger();
  const random = options.random ?? Math.random;

  return (payload) => {
    const section = config.forOperation(payload.operationName);
    const matched = Object.entries(section.policies).find(([, condition]) =>
      conditionMatches(condition, payload)
    );
    if (!matched) {
      return undefined;
    }

    const [policyName] = matched;
    if (payload.attempt >= section.maxAttempts) {
      logger.debug('Retry attempts exhausted', {
        service: config.endpointPrefix,
        operation: payload.operationName,
        policy: policyName,
        attempts: payload.attempt,
      });
      return RetryDecision.giveUp(`Max attempts (${section.maxAttempts}) reached`);
    }

    const delayMs = computeDelayMs(section.delay, payload.attempt, random);
    logger.debug('Retry needed', {
      service: config.endpointPrefix,
      operation: payload.operationName,
      policy: policyName,
      attempt: payload.attempt,
      delayMs,
    });
    return RetryDecision.retry(delayMs);
  };
}

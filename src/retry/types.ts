/**
 * Retry decision contract.
 *
 * @module retry/types
 */

/**
 * Answer of a `needs-retry` handler.
 */
export type RetryDecision =
  | { readonly kind: 'retry'; readonly delayMs: number }
  | { readonly kind: 'give-up'; readonly reason: string };

/**
 * RetryDecision factory functions.
 */
export const RetryDecision = {
  retry(delayMs: number): RetryDecision {
    return { kind: 'retry', delayMs };
  },
  giveUp(reason: string): RetryDecision {
    return { kind: 'give-up', reason };
  },
};

/**
 * Suspends the caller for a number of milliseconds.
 */
export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

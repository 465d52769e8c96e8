/**
 * Deadline-bounded polling for consumers that wait on state outside the
 * waiter model, e.g. a resource that must appear in a listing.
 *
 * @module poll/poll
 */

import { PollTimeoutError } from '../error/index.js';
import { defaultSleep, type Sleep } from '../retry/index.js';

export interface PollOptions<T> {
  /** Fetch the current state */
  poll: () => Promise<T>;
  /** Whether the state is final */
  isDone: (value: T) => boolean;
  /** Pause between polls */
  intervalMs: number;
  /** Deadline measured from the first call; 0 skips polling entirely */
  timeoutMs: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Repeat `poll` until `isDone` accepts its result.
 *
 * @returns The accepted value, or `undefined` when `timeoutMs` is 0
 * @throws {PollTimeoutError} When the deadline passes first
 *
 * @example
 * ```typescript
 * const widget = await pollUntil({
 *   poll: () => client.call('GetWidget', { WidgetId: 'w-1' }),
 *   isDone: (output) => output.Widget !== undefined,
 *   intervalMs: 2000,
 *   timeoutMs: 60000,
 * });
 * ```
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<T | undefined> {
  const { poll, isDone, intervalMs, timeoutMs } = options;
  if (timeoutMs <= 0) {
    return undefined;
  }
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const deadline = now() + timeoutMs;

  for (;;) {
    const value = await poll();
    if (isDone(value)) {
      return value;
    }
    if (now() + intervalMs > deadline) {
      throw new PollTimeoutError(timeoutMs);
    }
    await sleep(intervalMs);
  }
}

/**
 * Waiters: poll an operation until an acceptor reaches a terminal state.
 *
 * @module waiter/waiter
 */

import { ConfigurationError, ServiceError, WaiterError } from '../error/index.js';
import type { AcceptorDefinition, WaiterDefinition } from '../model/schema.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { isRecord } from '../protocol/values.js';
import { defaultSleep, type Sleep } from '../retry/index.js';
import { compilePath, evaluatePath } from './path.js';

/**
 * Invokes the waiter's operation once.
 */
export type WaiterOperation = (params: Record<string, unknown>) => Promise<Record<string, unknown>>;

export const ACCEPTOR_MATCHERS = ['path', 'pathAll', 'pathAny', 'status', 'error'] as const;

export type AcceptorMatcher = (typeof ACCEPTOR_MATCHERS)[number];

export type AcceptorState = AcceptorDefinition['state'];

/**
 * Outcome of a single attempt: the output when the call succeeded, the
 * service error when it failed.
 */
export type AttemptOutcome =
  | { kind: 'response'; response: Record<string, unknown> }
  | { kind: 'error'; error: ServiceError };

export interface WaiterOptions {
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Per-call overrides of the model's waiter configuration.
 */
export interface WaiterConfigOverrides {
  /** Seconds between attempts */
  delay?: number;
  /** Total attempt budget */
  maxAttempts?: number;
}

export interface WaiterResult {
  attempts: number;
  lastResponse?: Record<string, unknown>;
}

function isAcceptorMatcher(value: string): value is AcceptorMatcher {
  return ACCEPTOR_MATCHERS.some((matcher) => matcher === value);
}

function statusCodeOf(outcome: AttemptOutcome): number | undefined {
  if (outcome.kind === 'error') {
    return outcome.error.statusCode;
  }
  const metadata = outcome.response.ResponseMetadata;
  if (isRecord(metadata) && typeof metadata.HTTPStatusCode === 'number') {
    return metadata.HTTPStatusCode;
  }
  return undefined;
}

/**
 * Check whether an acceptor matches one attempt's outcome.
 */
export function acceptorMatches(acceptor: AcceptorDefinition, outcome: AttemptOutcome): boolean {
  const { matcher, expected, argument } = acceptor;

  if (matcher === 'error') {
    if (expected === true) {
      return outcome.kind === 'error';
    }
    if (expected === false) {
      return outcome.kind === 'response';
    }
    return outcome.kind === 'error' && outcome.error.code === expected;
  }

  if (matcher === 'status') {
    return statusCodeOf(outcome) === expected;
  }

  if (outcome.kind === 'error' || argument === undefined) {
    return false;
  }
  const value = evaluatePath(argument, outcome.response);
  switch (matcher) {
    case 'path':
      return value === expected;
    case 'pathAll':
      return Array.isArray(value) && value.length > 0 && value.every((item) => item === expected);
    case 'pathAny':
      return Array.isArray(value) && value.some((item) => item === expected);
    default:
      return false;
  }
}

/**
 * Poll an operation until one of its acceptors reports success or failure.
 *
 * @example
 * ```typescript
 * const waiter = await client.getWaiter('widget_available');
 * const { attempts } = await waiter.wait({ Filters: [{ Name: 'id', Values: ['w-1'] }] }, { delay: 1 });
 * ```
 */
export class Waiter {
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} If an acceptor uses an unknown matcher or a
   * path argument that does not parse
   */
  constructor(
    readonly name: string,
    readonly config: WaiterDefinition,
    private readonly operation: WaiterOperation,
    options: WaiterOptions = {}
  ) {
    for (const acceptor of config.acceptors) {
      if (!isAcceptorMatcher(acceptor.matcher)) {
        throw new ConfigurationError(
          `Unknown acceptor matcher "${acceptor.matcher}" in waiter ${name}`
        );
      }
      if (acceptor.matcher !== 'status' && acceptor.matcher !== 'error') {
        if (acceptor.argument === undefined) {
          throw new ConfigurationError(
            `Acceptor matcher "${acceptor.matcher}" in waiter ${name} needs an argument`
          );
        }
        compilePath(acceptor.argument);
      }
    }
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? new NoopLogger();
  }

  get operationName(): string {
    return this.config.operation;
  }

  /**
   * @throws {ConfigurationError} If `maxAttempts` is not a positive integer
   * or `delay` is negative; no call is made
   * @throws {WaiterError} On a failure state, an unmatched service error, or
   * when the attempt budget runs out
   */
  async wait(
    params: Record<string, unknown> = {},
    overrides: WaiterConfigOverrides = {}
  ): Promise<WaiterResult> {
    const delaySeconds = overrides.delay ?? this.config.delay;
    const maxAttempts = overrides.maxAttempts ?? this.config.maxAttempts;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError(
        `Invalid maxAttempts for waiter ${this.name}: ${maxAttempts} (expected a positive integer)`
      );
    }
    if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
      throw new ConfigurationError(
        `Invalid delay for waiter ${this.name}: ${delaySeconds} (expected seconds >= 0)`
      );
    }
    let lastResponse: Record<string, unknown> | undefined;

    for (let attempt = 1; ; attempt++) {
      const outcome = await this.attempt(params);
      if (outcome.kind === 'response') {
        lastResponse = outcome.response;
      }

      const acceptor = this.config.acceptors.find((candidate) => acceptorMatches(candidate, outcome));
      const state: AcceptorState | undefined = acceptor?.state;

      if (state === 'success') {
        this.logger.debug('Waiter reached success state', { waiter: this.name, attempts: attempt });
        return { attempts: attempt, lastResponse };
      }
      if (state === 'failure') {
        throw new WaiterError(this.name, 'failure-state', attempt, {
          lastResponse,
          cause: outcome.kind === 'error' ? outcome.error : undefined,
        });
      }
      if (state === undefined && outcome.kind === 'error') {
        throw new WaiterError(this.name, 'unexpected-error', attempt, {
          lastResponse,
          cause: outcome.error,
        });
      }

      if (attempt >= maxAttempts) {
        throw new WaiterError(this.name, 'max-attempts', attempt, { lastResponse });
      }
      this.logger.trace('Waiter retrying', { waiter: this.name, attempt, delaySeconds });
      await this.sleep(delaySeconds * 1000);
    }
  }

  private async attempt(params: Record<string, unknown>): Promise<AttemptOutcome> {
    try {
      return { kind: 'response', response: await this.operation(params) };
    } catch (error) {
      if (error instanceof ServiceError) {
        return { kind: 'error', error };
      }
      throw error;
    }
  }
}

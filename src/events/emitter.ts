/**
 * Publish/subscribe hub for call lifecycle events.
 *
 * @module events/emitter
 */

import type {
  EventContext,
  EventHandler,
  EventName,
  EventPattern,
  EventPayloads,
  EventResponses,
  EventScope,
} from './types.js';

interface Registration<E extends EventName> {
  readonly pattern: EventPattern<E>;
  readonly handler: EventHandler<E>;
  readonly handlerId?: string;
  readonly seq: number;
}

type Registry = { [E in EventName]: Registration<E>[] };

/**
 * Description of a registered handler, for inspection.
 */
export interface RegisteredHandler {
  pattern: EventPattern;
  handlerId?: string;
}

function emptyRegistry(): Registry {
  return {
    'before-parameter-build': [],
    'before-call': [],
    'request-created': [],
    'before-sign': [],
    'after-sign': [],
    'needs-retry': [],
    'after-call': [],
  };
}

function samePattern(a: EventPattern, b: EventPattern): boolean {
  return a.event === b.event && a.service === b.service && a.operation === b.operation;
}

function matches(pattern: EventPattern, scope: EventScope): boolean {
  return (
    (pattern.service === undefined || pattern.service === scope.service) &&
    (pattern.operation === undefined || pattern.operation === scope.operation)
  );
}

function specificity(pattern: EventPattern): number {
  return (pattern.service === undefined ? 0 : 1) + (pattern.operation === undefined ? 0 : 1);
}

function isAnswer<T>(value: T | void): value is T {
  return value !== undefined;
}

/**
 * Event emitter with structured scopes.
 *
 * Handlers run most general pattern first, then in registration order.
 * Registering the same id (or, without an id, the same function) twice on
 * one pattern is a no-op.
 *
 * @example
 * ```typescript
 * const events = new EventEmitter();
 * events.register({ event: 'request-created', service: 'widgets' }, ({ request }) => {
 *   request.headers['x-trace'] = 'abc';
 * }, 'add-trace-header');
 *
 * await events.emit('request-created', { service: 'widgets', operation: 'GetWidget' }, payload);
 * ```
 */
export class EventEmitter {
  private registry: Registry = emptyRegistry();
  private nextSeq = 0;

  /**
   * @returns Whether the handler was added
   */
  register<E extends EventName>(
    pattern: EventPattern<E>,
    handler: EventHandler<E>,
    handlerId?: string
  ): boolean {
    const list: Registration<E>[] = this.registry[pattern.event];
    const duplicate = list.some(
      (entry) =>
        samePattern(entry.pattern, pattern) &&
        (handlerId !== undefined ? entry.handlerId === handlerId : entry.handler === handler)
    );
    if (duplicate) {
      return false;
    }
    list.push({ pattern: { ...pattern }, handler, handlerId, seq: this.nextSeq++ });
    return true;
  }

  /**
   * Remove a handler by id, or by function when it was registered without one.
   *
   * @returns Whether a handler was removed
   */
  unregister<E extends EventName>(
    pattern: EventPattern<E>,
    handlerOrId: string | EventHandler<E>
  ): boolean {
    const list: Registration<E>[] = this.registry[pattern.event];
    const index = list.findIndex(
      (entry) =>
        samePattern(entry.pattern, pattern) &&
        (typeof handlerOrId === 'string'
          ? entry.handlerId === handlerOrId
          : entry.handler === handlerOrId)
    );
    if (index === -1) {
      return false;
    }
    list.splice(index, 1);
    return true;
  }

  /**
   * Run every matching handler in order, awaiting each.
   */
  async emit<E extends EventName>(
    event: E,
    scope: EventScope,
    payload: EventPayloads[E]
  ): Promise<Array<EventResponses[E]>> {
    const answers: Array<EventResponses[E]> = [];
    const context: EventContext<E> = { event, scope };
    for (const entry of this.snapshot(event, scope)) {
      const answer = await entry.handler(payload, context);
      if (isAnswer(answer)) {
        answers.push(answer);
      }
    }
    return answers;
  }

  /**
   * Run matching handlers until one answers.
   *
   * @returns The first answer, or `undefined` when no handler answered
   */
  async emitUntilResponse<E extends EventName>(
    event: E,
    scope: EventScope,
    payload: EventPayloads[E]
  ): Promise<EventResponses[E] | undefined> {
    const context: EventContext<E> = { event, scope };
    for (const entry of this.snapshot(event, scope)) {
      const answer = await entry.handler(payload, context);
      if (isAnswer(answer)) {
        return answer;
      }
    }
    return undefined;
  }

  /**
   * Handlers that would run for an event in a scope, in run order.
   */
  handlersFor(event: EventName, scope: EventScope = {}): RegisteredHandler[] {
    return this.snapshot(event, scope).map((entry) => ({
      pattern: { ...entry.pattern },
      handlerId: entry.handlerId,
    }));
  }

  /**
   * Independent emitter with the same registrations.
   */
  copy(): EventEmitter {
    const clone = new EventEmitter();
    clone.registry = {
      'before-parameter-build': [...this.registry['before-parameter-build']],
      'before-call': [...this.registry['before-call']],
      'request-created': [...this.registry['request-created']],
      'before-sign': [...this.registry['before-sign']],
      'after-sign': [...this.registry['after-sign']],
      'needs-retry': [...this.registry['needs-retry']],
      'after-call': [...this.registry['after-call']],
    };
    clone.nextSeq = this.nextSeq;
    return clone;
  }

  private snapshot<E extends EventName>(event: E, scope: EventScope): Registration<E>[] {
    const list: Registration<E>[] = this.registry[event];
    return list
      .filter((entry) => matches(entry.pattern, scope))
      .sort((a, b) => specificity(a.pattern) - specificity(b.pattern) || a.seq - b.seq);
  }
}

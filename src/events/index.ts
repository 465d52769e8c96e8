/**
 * Events module.
 *
 * @module events
 */

export { EventEmitter, type RegisteredHandler } from './emitter.js';
export type {
  EventContext,
  EventHandler,
  EventName,
  EventPattern,
  EventPayloads,
  EventResponses,
  EventScope,
  SignEventPayload,
} from './types.js';

/**
 * Waiter module.
 *
 * @module waiter
 */

export { evaluatePath, compilePath } from './path.js';
export {
  Waiter,
  acceptorMatches,
  ACCEPTOR_MATCHERS,
  type AcceptorMatcher,
  type AcceptorState,
  type AttemptOutcome,
  type WaiterOperation,
  type WaiterOptions,
  type WaiterConfigOverrides,
  type WaiterResult,
} from './waiter.js';

/**
 * Poll module.
 *
 * @module poll
 */

export { pollUntil, type PollOptions } from './poll.js';

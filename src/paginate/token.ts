/**
 * Resume tokens for truncated pagination.
 *
 * @module paginate/token
 */

import { z } from 'zod';
import { PaginationError } from '../error/index.js';

const ResumeStateSchema = z.object({
  tokens: z.record(z.unknown()),
  skip: z.number().int().nonnegative().optional(),
});

/**
 * Where a truncated iteration stopped: the input tokens of the page it
 * stopped in, and how many items of that page were already returned.
 */
export type ResumeState = z.infer<typeof ResumeStateSchema>;

/**
 * @example
 * ```typescript
 * encodeResumeToken({ tokens: { NextToken: 'A' }, skip: 2 });
 * // base64 of '{"tokens":{"NextToken":"A"},"skip":2}'
 * ```
 */
export function encodeResumeToken(state: ResumeState): string {
  const body: ResumeState = state.skip ? state : { tokens: state.tokens };
  return Buffer.from(JSON.stringify(body), 'utf8').toString('base64');
}

/**
 * @throws {PaginationError} If the token was not produced by {@link encodeResumeToken}
 */
export function decodeResumeToken(token: string): ResumeState {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(token, 'base64').toString('utf8'));
  } catch {
    throw new PaginationError(`Invalid starting token: ${token}`);
  }
  const result = ResumeStateSchema.safeParse(decoded);
  if (!result.success) {
    throw new PaginationError(`Invalid starting token: ${token}`);
  }
  return result.data;
}

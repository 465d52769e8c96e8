/**
 * Path expressions used by waiter acceptors.
 *
 * Supported forms: `a.b`, `a[].b` (projection), `a[0]` / `a[-1]` (index)
 * and `length(expr)`.
 *
 * @module waiter/path
 */

import { ConfigurationError } from '../error/index.js';
import { isRecord } from '../protocol/values.js';

export type PathToken =
  | { kind: 'field'; name: string }
  | { kind: 'index'; index: number }
  | { kind: 'flatten' };

export interface CompiledPath {
  tokens: PathToken[];
  length: boolean;
}

const TOKEN_PATTERN = /([A-Za-z_][A-Za-z0-9_]*)|\[(-?\d*)\]|(\.)/y;

const compiled = new Map<string, CompiledPath>();

/**
 * @throws {ConfigurationError} If the expression cannot be parsed
 */
export function compilePath(expression: string): CompiledPath {
  const cached = compiled.get(expression);
  if (cached) {
    return cached;
  }

  const trimmed = expression.trim();
  const lengthMatch = /^length\((.+)\)$/.exec(trimmed);
  const body = lengthMatch?.[1]?.trim() ?? trimmed;
  const tokens: PathToken[] = [];

  TOKEN_PATTERN.lastIndex = 0;
  let expectField = true;
  while (TOKEN_PATTERN.lastIndex < body.length) {
    const start = TOKEN_PATTERN.lastIndex;
    const match = TOKEN_PATTERN.exec(body);
    if (!match) {
      throw new ConfigurationError(`Invalid path expression "${expression}" at offset ${start}`);
    }
    const [, field, bracket, dot] = match;
    if (field !== undefined) {
      if (!expectField) {
        throw new ConfigurationError(`Invalid path expression "${expression}" at offset ${start}`);
      }
      tokens.push({ kind: 'field', name: field });
      expectField = false;
    } else if (dot !== undefined) {
      if (expectField) {
        throw new ConfigurationError(`Invalid path expression "${expression}" at offset ${start}`);
      }
      expectField = true;
    } else {
      tokens.push(bracket === '' ? { kind: 'flatten' } : { kind: 'index', index: Number(bracket) });
      expectField = false;
    }
  }
  if (tokens.length === 0 || expectField) {
    throw new ConfigurationError(`Invalid path expression "${expression}"`);
  }

  const result = { tokens, length: lengthMatch !== null };
  compiled.set(expression, result);
  return result;
}

function evaluateTokens(tokens: readonly PathToken[], value: unknown): unknown {
  const [token, ...rest] = tokens;
  if (token === undefined) {
    return value;
  }
  switch (token.kind) {
    case 'field':
      return isRecord(value) ? evaluateTokens(rest, value[token.name]) : undefined;
    case 'index': {
      if (!Array.isArray(value)) {
        return undefined;
      }
      const index = token.index < 0 ? value.length + token.index : token.index;
      return evaluateTokens(rest, value[index]);
    }
    case 'flatten': {
      if (!Array.isArray(value)) {
        return undefined;
      }
      const projected: unknown[] = [];
      for (const item of value.flatMap((entry: unknown) => (Array.isArray(entry) ? entry : [entry]))) {
        const result = evaluateTokens(rest, item);
        if (result !== undefined && result !== null) {
          projected.push(result);
        }
      }
      return rest.some((next) => next.kind === 'flatten')
        ? projected.flatMap((entry) => (Array.isArray(entry) ? entry : [entry]))
        : projected;
    }
  }
}

/**
 * Evaluate an expression against a response.
 *
 * @example
 * ```typescript
 * const output = { Widgets: [{ State: 'available' }, { State: 'pending' }] };
 * evaluatePath('Widgets[].State', output);  // ['available', 'pending']
 * evaluatePath('Widgets[0].State', output); // 'available'
 * evaluatePath('length(Widgets)', output);  // 2
 * ```
 */
export function evaluatePath(expression: string, data: unknown): unknown {
  const path = compilePath(expression);
  const value = evaluateTokens(path.tokens, data);
  if (!path.length) {
    return value;
  }
  if (Array.isArray(value) || typeof value === 'string') {
    return value.length;
  }
  if (isRecord(value)) {
    return Object.keys(value).length;
  }
  return undefined;
}

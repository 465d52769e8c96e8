/**
 * Lazy page sequences over paginated operations.
 *
 * @module paginate/paginator
 */

import { PaginationError } from '../error/index.js';
import type { PaginatorDefinition } from '../model/schema.js';
import { isRecord } from '../protocol/values.js';
import { decodeResumeToken, encodeResumeToken } from './token.js';

/**
 * Invokes the paginated operation with one page's parameters.
 */
export type PageFetcher = (params: Record<string, unknown>) => Promise<Record<string, unknown>>;

export interface PaginateOptions {
  /** Stop after this many items of the first result key */
  maxItems?: number;
  /** Sent under the operation's limit key */
  pageSize?: number;
  /** Resume token from a previous truncated iteration */
  startingToken?: string;
}

function asList(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Read a dotted path such as `Pagination.NextToken`.
 */
function getPath(source: Record<string, unknown>, path: string): unknown {
  let current: unknown = source;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function setPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop() ?? path;
  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Copy of `source` with `path` set to `value`; records along the path are
 * copied, everything else is shared.
 */
function withPath(source: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head, ...rest] = path.split('.');
  if (head === undefined) {
    return source;
  }
  if (rest.length === 0) {
    return { ...source, [head]: value };
  }
  const child = source[head];
  return { ...source, [head]: withPath(isRecord(child) ? child : {}, rest.join('.'), value) };
}

function hasTokens(tokens: Record<string, unknown>): boolean {
  return Object.values(tokens).some((value) => value !== undefined && value !== null && value !== '');
}

/**
 * One iteration over the pages of an operation. Iterating again starts
 * over from the first page (or the starting token).
 *
 * @example
 * ```typescript
 * const pages = paginator.paginate({ Filters: [] }, { maxItems: 25 });
 * for await (const page of pages) {
 *   console.log(page.Widgets);
 * }
 * pages.resumeToken; // set when maxItems cut the sequence short
 * ```
 */
export class PageIterator implements AsyncIterable<Record<string, unknown>> {
  private readonly inputTokens: string[];
  private readonly outputTokens: string[];
  private readonly resultKeys: string[];
  private lastResumeToken?: string;

  constructor(
    private readonly fetchPage: PageFetcher,
    private readonly config: PaginatorDefinition,
    private readonly baseParams: Record<string, unknown>,
    private readonly options: PaginateOptions = {}
  ) {
    this.inputTokens = asList(config.inputToken);
    this.outputTokens = asList(config.outputToken);
    this.resultKeys = asList(config.resultKey);
  }

  /**
   * Token to pass as `startingToken` to continue after a `maxItems` cut.
   */
  get resumeToken(): string | undefined {
    return this.lastResumeToken;
  }

  [Symbol.asyncIterator](): AsyncIterator<Record<string, unknown>> {
    return this.pages();
  }

  private async *pages(): AsyncGenerator<Record<string, unknown>> {
    this.lastResumeToken = undefined;
    const { maxItems, pageSize, startingToken } = this.options;
    const start = startingToken === undefined ? undefined : decodeResumeToken(startingToken);

    let tokens: Record<string, unknown> = start ? { ...start.tokens } : {};
    let skip = start?.skip ?? 0;
    let total = 0;

    for (;;) {
      const params: Record<string, unknown> = { ...this.baseParams };
      for (const [name, value] of Object.entries(tokens)) {
        if (value !== undefined && value !== null) {
          params[name] = value;
        }
      }
      if (pageSize !== undefined && this.config.limitKey !== undefined) {
        params[this.config.limitKey] = pageSize;
      }

      let page = await this.fetchPage(params);
      if (skip > 0) {
        page = this.sliceResults(page, skip);
      }
      const count = this.primaryCount(page);
      const nextTokens = this.nextTokens(page);

      if (maxItems !== undefined && total + count >= maxItems) {
        const keep = maxItems - total;
        if (keep < count) {
          this.lastResumeToken = encodeResumeToken({ tokens, skip: skip + keep });
          yield this.sliceResults(page, 0, keep);
        } else {
          if (hasTokens(nextTokens)) {
            this.lastResumeToken = encodeResumeToken({ tokens: nextTokens });
          }
          yield page;
        }
        return;
      }

      yield page;
      total += count;

      if (!hasTokens(nextTokens)) {
        return;
      }
      if (JSON.stringify(nextTokens) === JSON.stringify(tokens)) {
        throw new PaginationError(
          `The same next token was received twice: ${JSON.stringify(nextTokens)}`
        );
      }
      tokens = nextTokens;
      skip = 0;
    }
  }

  /**
   * Aggregate every result key across all pages into one output.
   *
   * @example
   * ```typescript
   * await paginator.paginate({}).buildFullResult();
   * // { Widgets: [...every widget...] }
   * ```
   */
  async buildFullResult(): Promise<Record<string, unknown>> {
    const collected = new Map<string, unknown[]>(this.resultKeys.map((key) => [key, []]));
    for await (const page of this) {
      for (const key of this.resultKeys) {
        const value = getPath(page, key);
        if (Array.isArray(value)) {
          collected.get(key)?.push(...value);
        }
      }
    }

    const result: Record<string, unknown> = {};
    for (const [key, items] of collected) {
      setPath(result, key, items);
    }
    if (this.lastResumeToken !== undefined) {
      result.NextToken = this.lastResumeToken;
    }
    return result;
  }

  private primaryCount(page: Record<string, unknown>): number {
    const primary = this.resultKeys[0];
    if (primary === undefined) {
      return 0;
    }
    const items = getPath(page, primary);
    return Array.isArray(items) ? items.length : 0;
  }

  private nextTokens(page: Record<string, unknown>): Record<string, unknown> {
    const moreResults = this.config.moreResults;
    if (moreResults !== undefined && !getPath(page, moreResults)) {
      return {};
    }
    const tokens: Record<string, unknown> = {};
    this.inputTokens.forEach((name, index) => {
      const outputPath = this.outputTokens[index];
      if (outputPath !== undefined) {
        tokens[name] = getPath(page, outputPath);
      }
    });
    return tokens;
  }

  private sliceResults(page: Record<string, unknown>, from: number, to?: number): Record<string, unknown> {
    let sliced = page;
    for (const key of this.resultKeys) {
      const value = getPath(page, key);
      if (Array.isArray(value)) {
        sliced = withPath(sliced, key, value.slice(from, to));
      }
    }
    return sliced;
  }
}

/**
 * Paginator for one operation.
 *
 * @example
 * ```typescript
 * const paginator = await client.getPaginator('describeWidgets');
 * const all = await paginator.paginate({ MaxResults: 50 }).buildFullResult();
 * ```
 */
export class Paginator {
  constructor(
    private readonly fetchPage: PageFetcher,
    private readonly definition: PaginatorDefinition,
    readonly operationName: string
  ) {}

  get config(): PaginatorDefinition {
    return this.definition;
  }

  paginate(params: Record<string, unknown> = {}, options: PaginateOptions = {}): PageIterator {
    return new PageIterator(this.fetchPage, this.definition, { ...params }, options);
  }
}

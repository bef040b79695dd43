import { isDeepStrictEqual } from 'node:util';
import { PaginationError } from '../errors/index.js';
import type { CallOptions, PaginatorDefinition, ParsedResponse } from '../types/index.js';
import { getPath, setPath, toList } from '../utils/index.js';
import { decodeResumeToken, encodeResumeToken } from './tokens.js';

/**
 * One page fetch: a full client call with the given params
 */
export type PageMethod = (
  params: Record<string, unknown>,
  options?: CallOptions,
) => Promise<ParsedResponse>;

export interface PaginationOptions {
  /**
   * Stop after this many items of the primary result key
   */
  maxItems?: number;

  /**
   * Items requested per page, sent in the operation's limit parameter
   */
  pageSize?: number;

  /**
   * `resumeToken` of an earlier iteration
   */
  startingToken?: string;

  signal?: AbortSignal;
}

export interface PageIteratorInit {
  method: PageMethod;
  definition: PaginatorDefinition;
  params: Record<string, unknown>;
  options: PaginationOptions;
}

function isEmptyToken(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Lazily fetches pages of a listing operation.
 *
 * Every `for await` starts over from the initial params (or the starting
 * token) and ends when the service stops returning a continuation token.
 *
 * @example
 * ```typescript
 * const pages = client.getPaginator('listBuckets').paginate({}, { pageSize: 50 });
 * for await (const page of pages) {
 *   console.log(page.Buckets);
 * }
 * ```
 */
export class PageIterator implements AsyncIterable<ParsedResponse> {
  protected readonly method: PageMethod;
  protected readonly params: Record<string, unknown>;
  protected readonly options: PaginationOptions;

  readonly inputTokens: string[];
  readonly outputTokens: string[];
  readonly resultKeys: string[];
  readonly limitKey?: string;
  readonly moreResults?: string;

  private lastResumeToken?: string;

  constructor(init: PageIteratorInit) {
    this.method = init.method;
    this.params = init.params;
    this.options = init.options;
    this.inputTokens = toList(init.definition.inputToken);
    this.outputTokens = toList(init.definition.outputToken);
    this.resultKeys = toList(init.definition.resultKey);
    this.limitKey = init.definition.limitKey;
    this.moreResults = init.definition.moreResults;
  }

  /**
   * Where the last iteration stopped because of `maxItems`, if it did
   */
  get resumeToken(): string | undefined {
    return this.lastResumeToken;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ParsedResponse, void, undefined> {
    const { maxItems, pageSize, startingToken, signal } = this.options;
    const params = structuredClone(this.params);
    this.lastResumeToken = undefined;

    if (pageSize !== undefined) {
      if (!this.limitKey) {
        throw new PaginationError(
          'PageSize parameter is not supported for the pagination interface for this operation.',
        );
      }
      setPath(params, this.limitKey, pageSize);
    }

    let currentToken: Record<string, unknown> = Object.fromEntries(
      this.inputTokens.map((name) => [name, undefined]),
    );
    let startingTruncation = 0;
    if (startingToken !== undefined) {
      const decoded = decodeResumeToken(startingToken);
      currentToken = decoded.tokens;
      startingTruncation = decoded.truncateAmount ?? 0;
      this.injectToken(params, currentToken);
    }

    let total = 0;
    let firstRequest = true;
    let previousToken: Record<string, unknown> | undefined;

    while (true) {
      const page = await this.method(params, { signal });

      if (firstRequest) {
        if (startingTruncation > 0) {
          this.truncateLeading(page, startingTruncation);
        }
        firstRequest = false;
      } else {
        startingTruncation = 0;
      }

      const count = this.primaryResults(page).length;
      const overflow = maxItems === undefined ? 0 : total + count - maxItems;
      if (overflow > 0) {
        const keep = count - overflow;
        this.truncateTrailing(page, keep);
        this.lastResumeToken = encodeResumeToken(currentToken, keep + startingTruncation);
        yield page;
        return;
      }

      yield page;
      total += count;

      const nextToken = this.nextToken(page);
      if (!nextToken) {
        return;
      }
      if (maxItems !== undefined && total === maxItems) {
        this.lastResumeToken = encodeResumeToken(nextToken);
        return;
      }
      if (previousToken !== undefined && isDeepStrictEqual(previousToken, nextToken)) {
        throw new PaginationError(
          `The same next token was received twice: ${JSON.stringify(nextToken)}`,
        );
      }

      this.injectToken(params, nextToken);
      previousToken = nextToken;
      currentToken = nextToken;
    }
  }

  /**
   * Fetch every page and merge the result keys into one object. When
   * iteration stopped at `maxItems`, `NextToken` holds the resume token.
   */
  async buildFullResult(): Promise<Record<string, unknown>> {
    const result: Record<string, unknown> = {};

    for await (const page of this) {
      for (const key of this.resultKeys) {
        const value = getPath(page, key);
        if (value === undefined || value === null) {
          continue;
        }

        const existing = getPath(result, key);
        if (Array.isArray(value)) {
          setPath(result, key, Array.isArray(existing) ? [...existing, ...value] : [...value]);
        } else if (typeof value === 'number' && typeof existing === 'number') {
          setPath(result, key, existing + value);
        } else if (typeof value === 'string' && typeof existing === 'string') {
          setPath(result, key, existing + value);
        } else {
          setPath(result, key, value);
        }
      }
    }

    if (this.lastResumeToken !== undefined) {
      result.NextToken = this.lastResumeToken;
    }
    return result;
  }

  /**
   * Continuation token of a page, or undefined when it is the last one
   */
  protected nextToken(page: ParsedResponse): Record<string, unknown> | undefined {
    if (this.moreResults !== undefined && !getPath(page, this.moreResults)) {
      return undefined;
    }

    const values = this.outputTokens.map((path) => getPath(page, path));
    if (values.every(isEmptyToken)) {
      return undefined;
    }
    return Object.fromEntries(this.inputTokens.map((name, i) => [name, values[i]]));
  }

  private injectToken(params: Record<string, unknown>, token: Record<string, unknown>): void {
    for (const [name, value] of Object.entries(token)) {
      if (isEmptyToken(value)) {
        delete params[name];
      } else {
        setPath(params, name, value);
      }
    }
  }

  private primaryResults(page: ParsedResponse): unknown[] {
    const [primary] = this.resultKeys;
    if (primary === undefined) {
      return [];
    }
    const value = getPath(page, primary);
    return Array.isArray(value) ? value : [];
  }

  /**
   * Drop items the previous iteration already returned
   */
  private truncateLeading(page: ParsedResponse, amount: number): void {
    const [primary, ...secondary] = this.resultKeys;
    if (primary === undefined) {
      return;
    }
    setPath(page, primary, this.primaryResults(page).slice(amount));
    for (const key of secondary) {
      if (Array.isArray(getPath(page, key))) {
        setPath(page, key, []);
      }
    }
  }

  private truncateTrailing(page: ParsedResponse, keep: number): void {
    const [primary] = this.resultKeys;
    if (primary !== undefined) {
      setPath(page, primary, this.primaryResults(page).slice(0, keep));
    }
  }
}

import type { PaginatorDefinition } from '../types/index.js';
import {
  PageIterator,
  type PageIteratorInit,
  type PageMethod,
  type PaginationOptions,
} from './page-iterator.js';

/**
 * Page-fetch strategy a paginator builds its iterators with
 */
export type PageIteratorClass = new (init: PageIteratorInit) => PageIterator;

export interface PaginatorOptions {
  /**
   * @default PageIterator
   */
  pageIteratorClass?: PageIteratorClass;
}

/**
 * Creates page iterators for one pageable operation of one client
 */
export class Paginator {
  private readonly pageIteratorClass: PageIteratorClass;

  constructor(
    private readonly method: PageMethod,
    public readonly definition: PaginatorDefinition,
    options: PaginatorOptions = {},
  ) {
    this.pageIteratorClass = options.pageIteratorClass ?? PageIterator;
  }

  paginate(params: Record<string, unknown> = {}, options: PaginationOptions = {}): PageIterator {
    return new this.pageIteratorClass({
      method: this.method,
      definition: this.definition,
      params,
      options,
    });
  }
}

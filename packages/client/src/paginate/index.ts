export { PageIterator } from './page-iterator.js';
export type {
  PageIteratorInit,
  PageMethod,
  PaginationOptions,
} from './page-iterator.js';
export { Paginator } from './paginator.js';
export type { PageIteratorClass, PaginatorOptions } from './paginator.js';
export { decodeResumeToken, encodeResumeToken } from './tokens.js';

/**
 * Pagination module.
 *
 * @module paginate
 */

export { Paginator, PageIterator } from './paginator.js';
export type { PageFetcher, PaginateOptions } from './paginator.js';
export { encodeResumeToken, decodeResumeToken } from './token.js';
export type { ResumeState } from './token.js';

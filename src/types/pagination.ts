/**
 * Pagination Types
 * The remote library service pages by zero-based page number and size
 */

/**
 * Parameters for paged queries
 */
export interface PageParams {
  page: number; // zero-based
  size: number;
}

/**
 * Page of items as returned by the remote service
 */
export interface Page<T> {
  content: T[];
  totalElements: number;
  totalPages: number;
  size: number;
  number: number;
  first: boolean;
  last: boolean;
}

/**
 * Default pagination values
 */
export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 1000;

/**
 * Normalize page params with defaults
 */
export function normalizePageParams(params: Partial<PageParams>): PageParams {
  const page = Math.max(Math.floor(params.page ?? 0), 0);
  const size = Math.min(
    Math.max(Math.floor(params.size ?? DEFAULT_PAGE_SIZE), 1),
    MAX_PAGE_SIZE
  );
  return { page, size };
}

/**
 * Pagination Types
 * Page/offset paging for the subscription history
 */

export interface PageParams {
  page: number;
  perPage: number;
}

export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

/**
 * Largest offset the history query takes (postgres integer)
 */
export const MAX_PAGE_OFFSET = 2_147_483_647;

/**
 * Last page whose offset stays within MAX_PAGE_OFFSET at any page size
 */
export const MAX_PAGE = Math.floor(MAX_PAGE_OFFSET / MAX_PER_PAGE) + 1;

/**
 * Normalize paging params: page >= 1, perPage clamped to [1, MAX_PER_PAGE]
 */
export function normalizePageParams(params: Partial<PageParams>): PageParams {
  const page = Math.max(Math.floor(params.page ?? 1), 1);
  const perPage = Math.min(
    Math.max(Math.floor(params.perPage ?? DEFAULT_PER_PAGE), 1),
    MAX_PER_PAGE
  );
  return { page, perPage };
}

export function pageOffset(params: PageParams): number {
  return (params.page - 1) * params.perPage;
}

export function countPages(total: number, perPage: number): number {
  return Math.ceil(total / perPage);
}

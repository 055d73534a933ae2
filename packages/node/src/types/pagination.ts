/**
 * Page-number pagination.
 *
 * List endpoints return { data, pagination: { page, limit, total, totalPages } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PageQuery {
  readonly page: number;
  readonly limit: number;
}

export interface PageWindow {
  readonly limit: number;
  readonly offset: number;
}

export interface PaginationMeta {
  readonly page: number;
  readonly limit: number;
  readonly total: number;
  readonly totalPages: number;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Translate a 1-based page into a LIMIT/OFFSET window.
 */
export function pageWindow(query: PageQuery): PageWindow {
  return { limit: query.limit, offset: (query.page - 1) * query.limit };
}

export function paginate<T>(
  data: readonly T[],
  total: number,
  query: PageQuery,
): PaginatedResponse<T> {
  return {
    data,
    pagination: {
      page: query.page,
      limit: query.limit,
      total,
      totalPages: Math.ceil(total / query.limit),
    },
  };
}

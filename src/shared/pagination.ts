// Page-size normalization and page counting
import { DEFAULT_PER_PAGE, MAX_PER_PAGE } from '../config/pagination.js';

export type PaginationQuery = {
  total: number;
  perPage?: number;
};

export type PaginationMeta = {
  total: number;
  perPage: number;
  numPages: number;
};

/**
 * Number of pages needed for `total` items. A collection always has at
 * least one page, even when empty.
 */
export function countPages(total: number, perPage: number): number {
  if (!Number.isFinite(total) || total <= 0) return 1;
  return Math.max(1, Math.ceil(total / Math.max(1, perPage)));
}

export function normalizePagination(q: PaginationQuery, defaultPerPage = DEFAULT_PER_PAGE): PaginationMeta {
  const total = Math.max(0, Math.floor(q.total));
  const perPage = Math.max(1, Math.min(MAX_PER_PAGE, Math.floor(q.perPage ?? defaultPerPage)));
  return { total, perPage, numPages: countPages(total, perPage) };
}

import { CONTEXT_KEY } from '../../config/pagination.js';
import { normalizePagination } from '../../shared/pagination.js';
import type { PaginationDefaults } from '../../plugins/pagination.js';
import { getElasticPageNumbers } from './elastic.js';
import { buildPageLinks, type PageLink } from './page-list.js';
import { getDataFromContext, getPageNumber, normalizePageNumber, type PaginationContext } from './page-number.js';
import { getPageNumbers } from './page-numbers.js';
import type { Marker, PaginationStyle, ParamSource } from './pagination.types.js';
import type { PaginationQuery } from './pagination.schemas.js';

export type PaginationState = {
  page: number;
  numPages: number;
  total: number;
  perPage: number;
  style: PaginationStyle;
  markers: Marker[];
  key: string;
  defaultNumber: number;
  removedKeys: string[];
  params: URLSearchParams;
};

export type RenderedPagination = Omit<PaginationState, 'key' | 'defaultNumber' | 'removedKeys' | 'params'> & {
  links: PageLink[];
};

/**
 * Compute the page markers for a request.
 *
 * `params` are the raw query parameters; `form` is submitted form data,
 * consulted only when the query does not carry the page key.
 */
export function resolvePagination(
  query: PaginationQuery,
  params: URLSearchParams,
  form: ParamSource | undefined,
  defaults: PaginationDefaults,
): PaginationState {
  const { total, perPage, numPages } = normalizePagination({ total: query.total, perPage: query.perPage }, defaults.perPage);
  const key = query.key ?? defaults.pageLabel;
  const startingPage = query.startingPage ?? defaults.defaultPage;
  const page = normalizePageNumber(getPageNumber([params, form], key, startingPage), numPages);

  const markers =
    query.style === 'elastic'
      ? getElasticPageNumbers(page, numPages, query.unit ?? defaults.unit)
      : getPageNumbers(page, numPages, query.extremes ?? defaults.extremes, query.arounds ?? defaults.arounds, query.arrows);

  return {
    page,
    numPages,
    total,
    perPage,
    style: query.style,
    markers,
    key,
    defaultNumber: defaults.defaultPage,
    removedKeys: defaults.removedKeys,
    params,
  };
}

/** Build the link list from pagination data previously stored in `context`. */
export function renderPagination(context: PaginationContext<PaginationState>): RenderedPagination {
  const state = getDataFromContext(context, CONTEXT_KEY);
  const { key, defaultNumber, removedKeys, params, ...rest } = state;
  const links = buildPageLinks(state.markers, {
    currentPage: state.page,
    numPages: state.numPages,
    params,
    key,
    defaultNumber,
    removedKeys,
  });
  return { ...rest, links };
}

// Pagination defaults. Every value here is overridable per call.

/** Querystring key holding the page number. */
export const PAGE_LABEL = 'page';

/** Querystring key naming which key holds the page; stripped from generated links. */
export const QS_KEY_META = 'querystring_key';

/** Key under which computed pagination data lives in a request context. */
export const CONTEXT_KEY = 'pagination';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

// Upper bounds accepted from callers over HTTP
export const MAX_TOTAL = Number.MAX_SAFE_INTEGER;
export const MAX_EXTREMES = 50;
export const MAX_AROUNDS = 50;
export const MAX_ELASTIC_UNIT = 1000;

// Fixed window
export const DEFAULT_EXTREMES = 3;
export const DEFAULT_AROUNDS = 2;
export const DEFAULT_ARROWS = false;

// Elastic
export const DEFAULT_ELASTIC_UNIT = 1;

export const FIRST_LABEL = '<<';
export const PREVIOUS_LABEL = '<';
export const NEXT_LABEL = '>';
export const LAST_LABEL = '>>';
export const GAP_LABEL = '...';

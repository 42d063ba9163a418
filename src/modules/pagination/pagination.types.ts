export const NAMED_CONTROLS = ['first', 'previous', 'next', 'last'] as const;
export type NamedControl = (typeof NAMED_CONTROLS)[number];

/**
 * One element of a page-number summary: a page number, a gap (`null`,
 * rendered as an ellipsis) or a navigation control.
 */
export type Marker = number | null | NamedControl;

export type PaginationStyle = 'fixed' | 'elastic';

/** A key/value source the page number may be read from (query string, form data). */
export type ParamSource = URLSearchParams | Readonly<Record<string, unknown>>;

export type QueryParams = Record<string, string | string[] | undefined>;

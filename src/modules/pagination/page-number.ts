import { CONTEXT_KEY, DEFAULT_PAGE, PAGE_LABEL } from '../../config/pagination.js';
import { PaginationError } from '../../shared/errors.js';
import { clamp } from '../../shared/utils.js';
import type { ParamSource } from './pagination.types.js';

const POSITIVE_INT = /^\s*\+?(\d+)\s*$/;

function lookup(source: ParamSource, key: string): { found: boolean; value: unknown } {
  if (source instanceof URLSearchParams) {
    const all = source.getAll(key);
    return all.length ? { found: true, value: all[all.length - 1] } : { found: false, value: undefined };
  }
  if (!Object.prototype.hasOwnProperty.call(source, key)) return { found: false, value: undefined };
  const value = source[key];
  if (Array.isArray(value)) return { found: true, value: value[value.length - 1] };
  return { found: true, value };
}

function parsePositiveInt(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;
  const m = POSITIVE_INT.exec(value);
  if (!m) return undefined;
  const n = Number(m[1]);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

/**
 * Read the page number from the first source holding `key`.
 *
 * Sources are searched in order; a missing key or a value that is not a
 * positive integer yields `defaultPage`. Malformed input never throws.
 */
export function getPageNumber(
  sources: ReadonlyArray<ParamSource | null | undefined>,
  key: string = PAGE_LABEL,
  defaultPage: number = DEFAULT_PAGE,
): number {
  for (const source of sources) {
    if (source == null) continue;
    const hit = lookup(source, key);
    if (hit.found) return parsePositiveInt(hit.value) ?? defaultPage;
  }
  return defaultPage;
}

/**
 * Map a possibly negative page number onto `1..numPages`.
 * `-1` is the last page; a negative index past the first page resolves to 1.
 */
export function normalizePageNumber(pageNumber: number, numPages: number): number {
  const pages = Math.max(1, Math.floor(numPages));
  const n = Math.trunc(pageNumber);
  if (n < 0) {
    const fromEnd = pages + n + 1;
    return fromEnd >= 1 ? fromEnd : 1;
  }
  return clamp(n, 1, pages);
}

export type PaginationContext<T> = Map<string, T> | Readonly<Record<string, T | undefined>>;

/**
 * Fetch `key` from a rendering context.
 * @throws PaginationError when the context holds no such value.
 */
export function getDataFromContext<T>(context: PaginationContext<T>, key: string = CONTEXT_KEY): T {
  let value: T | undefined;
  if (context instanceof Map) value = context.get(key);
  else if (Object.prototype.hasOwnProperty.call(context, key)) value = context[key];
  if (value === undefined) {
    throw new PaginationError(`Cannot find pagination data in context under "${key}"`, { key });
  }
  return value;
}

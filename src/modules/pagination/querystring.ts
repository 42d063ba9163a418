import { DEFAULT_PAGE, PAGE_LABEL, QS_KEY_META } from '../../config/pagination.js';
import type { QueryParams } from './pagination.types.js';

function toSearchParams(existing: URLSearchParams | QueryParams): URLSearchParams {
  if (existing instanceof URLSearchParams) return new URLSearchParams(existing);
  const params = new URLSearchParams();
  for (const [k, v] of Object.entries(existing)) {
    if (v === undefined) continue;
    if (Array.isArray(v)) v.forEach((item) => params.append(k, item));
    else params.append(k, v);
  }
  return params;
}

/**
 * Build the querystring linking to `pageNumber`, keeping every other parameter.
 *
 * The default page gets no `key` at all so its URL stays canonical. Keys in
 * `extraRemovedKeys` are always dropped. Returns `''` when nothing is left,
 * otherwise a string starting with `?`.
 */
export function buildQuerystring(
  existing: URLSearchParams | QueryParams,
  pageNumber: number,
  key: string = PAGE_LABEL,
  defaultNumber: number = DEFAULT_PAGE,
  extraRemovedKeys: Iterable<string> = [QS_KEY_META],
): string {
  const params = toSearchParams(existing);
  for (const removed of extraRemovedKeys) params.delete(removed);
  if (pageNumber === defaultNumber) params.delete(key);
  else params.set(key, String(pageNumber));
  const encoded = params.toString();
  return encoded ? `?${encoded}` : '';
}

/** Inverse of {@link buildQuerystring}: repeated keys become arrays. */
export function parseQuerystring(qs: string): Record<string, string | string[]> {
  const params = new URLSearchParams(qs.startsWith('?') ? qs.slice(1) : qs);
  // No prototype: keys such as `constructor` must not resolve to inherited members
  const out: Record<string, string | string[]> = Object.create(null);
  for (const [k, v] of params) {
    const prev = out[k];
    if (prev === undefined) out[k] = v;
    else if (Array.isArray(prev)) prev.push(v);
    else out[k] = [prev, v];
  }
  return out;
}

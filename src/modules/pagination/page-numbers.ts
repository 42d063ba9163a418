import { DEFAULT_ARROWS, DEFAULT_AROUNDS, DEFAULT_EXTREMES } from '../../config/pagination.js';
import { clamp } from '../../shared/utils.js';
import type { Marker } from './pagination.types.js';

/**
 * Fixed-window page list: the first and last `extremes` pages plus
 * `arounds` pages on each side of the current one, with `null` marking
 * each skipped run.
 *
 * `previous`/`next` are added unless the current page is the first/last.
 * With `arrows`, `first` and `last` are added next to them.
 *
 * @example
 * getPageNumbers(10, 20)
 * // ['previous', 1, 2, 3, null, 8, 9, 10, 11, 12, null, 18, 19, 20, 'next']
 */
export function getPageNumbers(
  currentPage: number,
  numPages: number,
  extremes: number = DEFAULT_EXTREMES,
  arounds: number = DEFAULT_AROUNDS,
  arrows: boolean = DEFAULT_ARROWS,
): Marker[] {
  if (numPages <= 1) return [1];
  const current = clamp(Math.trunc(currentPage), 1, numPages);
  const ext = Math.max(0, Math.trunc(extremes));
  const around = Math.max(0, Math.trunc(arounds));

  // Inclusive [start, end] windows, each already clamped to the page range
  const windows: Array<[number, number]> = [[Math.max(1, current - around), Math.min(numPages, current + around)]];
  if (ext > 0) {
    windows.push([1, Math.min(ext, numPages)], [Math.max(1, numPages - ext + 1), numPages]);
  }
  windows.sort((a, b) => a[0] - b[0]);

  const merged: Array<[number, number]> = [];
  for (const [start, end] of windows) {
    const prev = merged[merged.length - 1];
    if (prev && start <= prev[1] + 1) prev[1] = Math.max(prev[1], end);
    else merged.push([start, end]);
  }

  const pages: Marker[] = [];
  if (current !== 1) {
    if (arrows) pages.push('first');
    pages.push('previous');
  }
  merged.forEach(([start, end], i) => {
    if (i > 0) pages.push(null);
    for (let page = start; page <= end; page++) pages.push(page);
  });
  if (current !== numPages) {
    pages.push('next');
    if (arrows) pages.push('last');
  }
  return pages;
}

import { DEFAULT_ELASTIC_UNIT } from '../../config/pagination.js';
import { clamp, range } from '../../shared/utils.js';
import type { Marker } from './pagination.types.js';

// 3, 10, 30, 100, 300, ... times `base`
function* factors(base: number): Generator<number, never> {
  for (let magnitude = 1; ; magnitude *= 10) {
    yield base * 3 * magnitude;
    yield base * 10 * magnitude;
  }
}

/**
 * S-curved range from `begin` to `end`: walks in from both ends by
 * growing steps until the two walks cross. A point where they meet
 * exactly is kept once.
 */
export function makeElasticRange(begin: number, end: number, unit: number = DEFAULT_ELASTIC_UNIT): number[] {
  // Huge spans start with a larger step so the list stays short
  const base = Math.max(1, Math.trunc(unit), Math.floor((end - begin) / 100));
  const steps = factors(base);
  const left: number[] = [];
  const right: number[] = [];
  let lo = begin;
  let hi = end;
  while (lo < hi) {
    left.push(lo);
    right.push(hi);
    const { value: step } = steps.next();
    lo = begin + step;
    hi = end - step;
  }
  if (lo === hi) left.push(lo);
  return left.concat(right.reverse());
}

/**
 * Elastic page list for large page counts: markers get sparser with
 * distance from the current page.
 *
 * Up to `10 * unit` pages every page is listed with no controls. Beyond
 * that `first`/`previous` lead unless on page 1, and `next`/`last` trail
 * unless on the last page.
 *
 * @example
 * getElasticPageNumbers(1, 11) // [1, 4, 8, 11, 'next', 'last']
 */
export function getElasticPageNumbers(
  currentPage: number,
  numPages: number,
  unit: number = DEFAULT_ELASTIC_UNIT,
): Marker[] {
  const total = Math.max(1, Math.trunc(numPages));
  const step = Math.max(1, Math.trunc(unit));
  if (total <= 10 * step) return range(1, total);

  const current = clamp(Math.trunc(currentPage), 1, total);
  const pages: Marker[] = [];
  if (current === 1) {
    pages.push(1);
  } else {
    pages.push('first', 'previous', ...makeElasticRange(1, current, step));
  }
  if (current !== total) {
    pages.push(...makeElasticRange(current, total, step).slice(1), 'next', 'last');
  }
  return pages;
}

import { getElasticPageNumbers, makeElasticRange } from '../elastic.js';
import type { Marker } from '../pagination.types.js';

describe('getElasticPageNumbers', () => {
  it('lists every page up to ten pages', () => {
    const cases: Array<[number, number]> = [
      [1, 1], [1, 2], [2, 2], [1, 3], [3, 3], [1, 5], [5, 5], [1, 9], [9, 9], [1, 10], [6, 10], [10, 10],
    ];
    for (const [current, numPages] of cases) {
      const expected = Array.from({ length: numPages }, (_, i) => i + 1);
      expect(getElasticPageNumbers(current, numPages)).toEqual(expected);
    }
  });

  it('curves around the current page past ten pages', () => {
    const table: Array<[number, number, Marker[]]> = [
      [1, 11, [1, 4, 8, 11, 'next', 'last']],
      [2, 11, ['first', 'previous', 1, 2, 5, 8, 11, 'next', 'last']],
      [3, 11, ['first', 'previous', 1, 3, 6, 8, 11, 'next', 'last']],
      [4, 11, ['first', 'previous', 1, 4, 7, 8, 11, 'next', 'last']],
      [5, 11, ['first', 'previous', 1, 5, 8, 11, 'next', 'last']],
      [6, 11, ['first', 'previous', 1, 6, 11, 'next', 'last']],
      [7, 11, ['first', 'previous', 1, 4, 7, 11, 'next', 'last']],
      [8, 11, ['first', 'previous', 1, 4, 5, 8, 11, 'next', 'last']],
      [9, 11, ['first', 'previous', 1, 4, 6, 9, 11, 'next', 'last']],
      [10, 11, ['first', 'previous', 1, 4, 7, 10, 11, 'next', 'last']],
      [11, 11, ['first', 'previous', 1, 4, 8, 11]],
    ];
    for (const [current, numPages, expected] of table) {
      expect(getElasticPageNumbers(current, numPages)).toEqual(expected);
    }
  });

  it('spreads markers further apart on larger ranges', () => {
    expect(getElasticPageNumbers(50, 100)).toEqual([
      'first', 'previous', 1, 4, 11, 40, 47, 50, 53, 60, 90, 97, 100, 'next', 'last',
    ]);
  });

  it('scales the small-range threshold with the unit', () => {
    expect(getElasticPageNumbers(3, 20, 2)).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
    expect(getElasticPageNumbers(1, 21, 2)).toEqual([1, 7, 15, 21, 'next', 'last']);
  });

  it('treats a non-positive page count as a single page', () => {
    expect(getElasticPageNumbers(1, 0)).toEqual([1]);
  });

  it('clamps the current page into range', () => {
    expect(getElasticPageNumbers(40, 11)).toEqual(getElasticPageNumbers(11, 11));
  });

  it('keeps numbers strictly ascending', () => {
    for (let numPages = 11; numPages <= 60; numPages++) {
      for (let current = 1; current <= numPages; current++) {
        const numbers = getElasticPageNumbers(current, numPages).filter((p): p is number => typeof p === 'number');
        expect(numbers[0]).toBe(1);
        expect(numbers[numbers.length - 1]).toBe(numPages);
        expect(numbers).toContain(current);
        numbers.forEach((n, i) => {
          if (i > 0) expect(n).toBeGreaterThan(numbers[i - 1]);
        });
      }
    }
  });
});

describe('makeElasticRange', () => {
  it('keeps the meeting point once', () => {
    expect(makeElasticRange(1, 7)).toEqual([1, 4, 7]);
  });

  it('returns a single point for an empty span', () => {
    expect(makeElasticRange(5, 5)).toEqual([5]);
  });

  it('steps by at least one page whatever the unit', () => {
    expect(makeElasticRange(1, 7, 0)).toEqual([1, 4, 7]);
    expect(makeElasticRange(1, 7, -2)).toEqual([1, 4, 7]);
  });

  it('starts with larger steps on huge spans', () => {
    expect(makeElasticRange(1, 1001)).toEqual([1, 31, 101, 301, 701, 901, 971, 1001]);
  });
});

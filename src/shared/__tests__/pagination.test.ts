import { countPages, normalizePagination } from '../pagination.js';

describe('countPages', () => {
  it('rounds partial pages up', () => {
    expect(countPages(95, 10)).toBe(10);
    expect(countPages(100, 10)).toBe(10);
    expect(countPages(101, 10)).toBe(11);
  });

  it('always has at least one page', () => {
    expect(countPages(0, 10)).toBe(1);
    expect(countPages(-5, 10)).toBe(1);
  });
});

describe('normalizePagination', () => {
  it('clamps the page size', () => {
    expect(normalizePagination({ total: 1000, perPage: 500 })).toEqual({ total: 1000, perPage: 100, numPages: 10 });
    expect(normalizePagination({ total: 3, perPage: 0 })).toEqual({ total: 3, perPage: 1, numPages: 3 });
  });

  it('uses the default page size', () => {
    expect(normalizePagination({ total: 45 })).toEqual({ total: 45, perPage: 10, numPages: 5 });
    expect(normalizePagination({ total: 45 }, 20)).toEqual({ total: 45, perPage: 20, numPages: 3 });
  });
});

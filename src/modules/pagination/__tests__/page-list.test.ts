import { buildPageLinks } from '../page-list.js';
import { getPageNumbers } from '../page-numbers.js';

describe('buildPageLinks', () => {
  it('links every marker to its target page', () => {
    const markers = getPageNumbers(2, 5, 1, 0);
    expect(markers).toEqual(['previous', 1, 2, null, 5, 'next']);

    const links = buildPageLinks(markers, { currentPage: 2, numPages: 5, params: { foo: 'bar' } });
    expect(links).toEqual([
      { type: 'previous', number: 1, label: '<', querystring: '?foo=bar', isCurrent: false },
      { type: 'page', number: 1, label: '1', querystring: '?foo=bar', isCurrent: false },
      { type: 'page', number: 2, label: '2', querystring: '?foo=bar&page=2', isCurrent: true },
      { type: 'gap', number: null, label: '...', querystring: null, isCurrent: false },
      { type: 'page', number: 5, label: '5', querystring: '?foo=bar&page=5', isCurrent: false },
      { type: 'next', number: 3, label: '>', querystring: '?foo=bar&page=3', isCurrent: false },
    ]);
  });

  it('resolves first and last to the range ends', () => {
    const links = buildPageLinks(['first', 'last'], { currentPage: 4, numPages: 9, key: 'p' });
    expect(links.map((l) => [l.number, l.querystring])).toEqual([
      [1, ''],
      [9, '?p=9'],
    ]);
  });

  it('uses custom labels', () => {
    const links = buildPageLinks([null, 'next'], { currentPage: 1, numPages: 3, labels: { next: 'Next', gap: '…' } });
    expect(links.map((l) => l.label)).toEqual(['…', 'Next']);
  });

  it('honours a custom default page and removed keys', () => {
    const links = buildPageLinks([3], {
      currentPage: 1,
      numPages: 3,
      params: { page: '1', token: 'x' },
      defaultNumber: 3,
      removedKeys: ['token'],
    });
    expect(links[0].querystring).toBe('');
  });
});

import {
  DEFAULT_PAGE,
  FIRST_LABEL,
  GAP_LABEL,
  LAST_LABEL,
  NEXT_LABEL,
  PAGE_LABEL,
  PREVIOUS_LABEL,
  QS_KEY_META,
} from '../../config/pagination.js';
import { buildQuerystring } from './querystring.js';
import type { Marker, NamedControl, QueryParams } from './pagination.types.js';

export type PageLabels = Record<NamedControl | 'gap', string>;

export const DEFAULT_LABELS: PageLabels = {
  first: FIRST_LABEL,
  previous: PREVIOUS_LABEL,
  next: NEXT_LABEL,
  last: LAST_LABEL,
  gap: GAP_LABEL,
};

export type PageLink =
  | {
      type: 'page' | NamedControl;
      number: number;
      label: string;
      querystring: string;
      isCurrent: boolean;
    }
  | { type: 'gap'; number: null; label: string; querystring: null; isCurrent: false };

export type PageLinkOptions = {
  currentPage: number;
  numPages: number;
  params?: URLSearchParams | QueryParams;
  key?: string;
  defaultNumber?: number;
  removedKeys?: readonly string[];
  labels?: Partial<PageLabels>;
};

function targetOf(control: NamedControl, currentPage: number, numPages: number): number {
  switch (control) {
    case 'first':
      return 1;
    case 'previous':
      return Math.max(1, currentPage - 1);
    case 'next':
      return Math.min(numPages, currentPage + 1);
    case 'last':
      return numPages;
  }
}

// Turns a marker sequence into link descriptors a template can render directly
export function buildPageLinks(markers: readonly Marker[], options: PageLinkOptions): PageLink[] {
  const {
    currentPage,
    numPages,
    params = {},
    key = PAGE_LABEL,
    defaultNumber = DEFAULT_PAGE,
    removedKeys = [QS_KEY_META],
  } = options;
  const labels: PageLabels = { ...DEFAULT_LABELS, ...options.labels };

  return markers.map((marker): PageLink => {
    if (marker === null) {
      return { type: 'gap', number: null, label: labels.gap, querystring: null, isCurrent: false };
    }
    if (typeof marker === 'number') {
      return {
        type: 'page',
        number: marker,
        label: String(marker),
        querystring: buildQuerystring(params, marker, key, defaultNumber, removedKeys),
        isCurrent: marker === currentPage,
      };
    }
    const number = targetOf(marker, currentPage, numPages);
    return {
      type: marker,
      number,
      label: labels[marker],
      querystring: buildQuerystring(params, number, key, defaultNumber, removedKeys),
      isCurrent: false,
    };
  });
}

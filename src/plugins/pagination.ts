// Pagination plugin: resolved defaults on app.pagination, per-request render context

import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config/env.js';
import { DEFAULT_PAGE, QS_KEY_META } from '../config/pagination.js';
import type { PaginationState } from '../modules/pagination/pagination.service.js';

export type PaginationDefaults = {
  pageLabel: string;
  defaultPage: number;
  perPage: number;
  extremes: number;
  arounds: number;
  unit: number;
  removedKeys: string[];
};

declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
    pagination: PaginationDefaults;
  }
  interface FastifyRequest {
    renderContext: Map<string, PaginationState> | null;
  }
}

async function plugin(app: FastifyInstance) {
  const { PAGINATION_PAGE_LABEL, PAGINATION_PER_PAGE, PAGINATION_EXTREMES, PAGINATION_AROUNDS, PAGINATION_ELASTIC_UNIT } =
    app.config;

  app.decorate('pagination', {
    pageLabel: PAGINATION_PAGE_LABEL,
    defaultPage: DEFAULT_PAGE,
    perPage: PAGINATION_PER_PAGE,
    extremes: PAGINATION_EXTREMES,
    arounds: PAGINATION_AROUNDS,
    unit: PAGINATION_ELASTIC_UNIT,
    removedKeys: [QS_KEY_META],
  });

  // Reference-type decorations must be assigned per request
  app.decorateRequest('renderContext', null);
  app.addHook('onRequest', async (req) => {
    req.renderContext = new Map();
  });
}

export default fp(plugin, { name: 'pagination' });

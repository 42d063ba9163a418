import { FastifyInstance, FastifyRequest } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';
import { CONTEXT_KEY } from '../../config/pagination.js';
import {
  paginationBodySchema,
  paginationQuerySchema,
  paginationResponseSchema,
  type PaginationBody,
  type PaginationQuery,
} from './pagination.schemas.js';
import { renderPagination, resolvePagination } from './pagination.service.js';

type PaginationRequest = Pick<FastifyRequest, 'url' | 'log' | 'renderContext'>;

function rawQuery(url: string): URLSearchParams {
  const idx = url.indexOf('?');
  return new URLSearchParams(idx === -1 ? '' : url.slice(idx + 1));
}

// Page marker routes under /api/pagination
export default async function paginationRoutes(app: FastifyInstance) {
  const zodApp = app.withTypeProvider<ZodTypeProvider>();

  const respond = (req: PaginationRequest, query: PaginationQuery, form: PaginationBody | undefined) => {
    const state = resolvePagination(query, rawQuery(req.url), form, app.pagination);
    req.log.debug({ page: state.page, numPages: state.numPages, style: state.style }, 'pagination resolved');
    req.renderContext?.set(CONTEXT_KEY, state);
    return renderPagination(req.renderContext ?? {});
  };

  zodApp.get(
    '/',
    {
      schema: {
        description: 'Page markers for the page named in the querystring',
        tags: ['pagination'],
        querystring: paginationQuerySchema,
        response: { 200: paginationResponseSchema },
      },
    },
    async (req) => respond(req, req.query, undefined)
  );

  zodApp.post(
    '/',
    {
      schema: {
        description: 'Page markers; the page number may also come from submitted form data',
        tags: ['pagination'],
        querystring: paginationQuerySchema,
        body: paginationBodySchema.optional(),
        response: { 200: paginationResponseSchema },
      },
    },
    async (req) => respond(req, req.query, req.body)
  );

  zodApp.get(
    '/defaults',
    {
      schema: {
        description: 'Service version and its pagination defaults',
        tags: ['pagination'],
        response: {
          200: z.object({
            version: z.string(),
            pageLabel: z.string(),
            defaultPage: z.number().int(),
            perPage: z.number().int(),
            extremes: z.number().int(),
            arounds: z.number().int(),
            unit: z.number().int(),
            removedKeys: z.array(z.string()),
          }),
        },
      },
    },
    async () => ({ version: app.config.SWAGGER_VERSION, ...app.pagination })
  );
}

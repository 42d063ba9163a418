import { z } from 'zod';
import { MAX_AROUNDS, MAX_ELASTIC_UNIT, MAX_EXTREMES, MAX_PER_PAGE, MAX_TOTAL } from '../../config/pagination.js';
import { NAMED_CONTROLS } from './pagination.types.js';

export const paginationStyleEnum = z.enum(['fixed', 'elastic']);

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

// Unknown keys pass through: the page number lives under a configurable key
export const paginationQuerySchema = z.looseObject({
  total: z.coerce.number().int().min(0).max(MAX_TOTAL),
  perPage: z.coerce.number().int().positive().max(MAX_PER_PAGE).optional(),
  style: paginationStyleEnum.default('fixed'),
  extremes: z.coerce.number().int().min(0).max(MAX_EXTREMES).optional(),
  arounds: z.coerce.number().int().min(0).max(MAX_AROUNDS).optional(),
  arrows: booleanFlag.optional(),
  unit: z.coerce.number().int().positive().max(MAX_ELASTIC_UNIT).optional(),
  key: z.string().min(1).optional(),
  startingPage: z.coerce.number().int().min(-MAX_TOTAL).max(MAX_TOTAL).optional(),
});
export type PaginationQuery = z.infer<typeof paginationQuerySchema>;

// Simulated submitted form data
export const paginationBodySchema = z.record(z.string(), z.union([z.string(), z.number(), z.array(z.string())]));
export type PaginationBody = z.infer<typeof paginationBodySchema>;

export const markerSchema = z.union([z.number().int(), z.null(), z.enum(NAMED_CONTROLS)]);

export const pageLinkSchema = z.object({
  type: z.enum(['page', 'gap', ...NAMED_CONTROLS]),
  number: z.number().int().nullable(),
  label: z.string(),
  querystring: z.string().nullable(),
  isCurrent: z.boolean(),
});

export const paginationResponseSchema = z.object({
  page: z.number().int(),
  numPages: z.number().int(),
  total: z.number().int(),
  perPage: z.number().int(),
  style: paginationStyleEnum,
  markers: z.array(markerSchema),
  links: z.array(pageLinkSchema),
});

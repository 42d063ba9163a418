import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUI from '@fastify/swagger-ui';
import {
  ZodTypeProvider,
  jsonSchemaTransform,
  jsonSchemaTransformObject,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import logger from './plugins/logger.js';
import paginationPlugin from './plugins/pagination.js';
import registerModules from './modules/index.js';
import { config, type AppConfig } from './config/env.js';
import { toErrorResponse } from './shared/errors.js';

export type CreateAppOptions = {
  config?: AppConfig;
  docs?: boolean;
};

// Factory that creates and configures Fastify instance (app-level setup)
export async function createApp(options: CreateAppOptions = {}) {
  const appConfig = options.config ?? config;
  const app = Fastify({
    loggerInstance: logger,
    trustProxy: true,
  }).withTypeProvider<ZodTypeProvider>();
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);
  app.decorate('config', appConfig);

  app.setErrorHandler((err, req, reply) => {
    const { statusCode, body } = toErrorResponse(err);
    if (statusCode >= 500) req.log.error(err);
    return reply.status(statusCode).send(body);
  });

  const allowedOrigins = new Set(appConfig.CORS_ORIGINS);
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      if (allowedOrigins.has(origin)) return cb(null, origin);
      return cb(new Error('Origin not allowed by CORS'), false);
    },
  });
  await app.register(rateLimit, { max: appConfig.RATE_LIMIT_MAX, timeWindow: '1 minute' });

  if (options.docs ?? true) {
    await app.register(fastifySwagger, {
      openapi: {
        info: {
          title: appConfig.SWAGGER_TITLE,
          version: appConfig.SWAGGER_VERSION,
          description: 'Page-marker summaries (fixed window and elastic) with ready-made page links.',
        },
        servers: [{ url: '/', description: 'Current host' }],
        tags: [
          { name: 'pagination', description: 'Page markers and links' },
        ],
      },
      transform: jsonSchemaTransform,
      transformObject: jsonSchemaTransformObject,
    });
    await app.register(fastifySwaggerUI, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        url: '/documentation/json',
      },
    });
  }

  await app.register(paginationPlugin);

  // Register all domain modules (routes)
  await app.register(registerModules);

  return app;
}

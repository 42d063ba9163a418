import { FastifyInstance } from 'fastify';
import paginationRoutes from './pagination/pagination.routes.js';

// Registers all domain modules and their route prefixes
export default async function registerModules(app: FastifyInstance) {
  await app.register(paginationRoutes, { prefix: '/api/pagination' });
}

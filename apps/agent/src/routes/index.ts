/**
 * Agent HTTP routes
 */

import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './health.js';
import { statusRoutes, type StatusSource } from './status.js';

export async function registerRoutes(app: FastifyInstance, status: StatusSource): Promise<void> {
  await app.register(healthRoutes);

  await app.register(
    async (api) => {
      await statusRoutes(api, status);
    },
    { prefix: '/api' }
  );
}

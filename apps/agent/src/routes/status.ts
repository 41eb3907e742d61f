/**
 * Status routes
 * Read-only views of the agent's status store
 */
import type { FastifyInstance } from 'fastify';
import type { StatusStore } from '@kubemend/core';

export type StatusSource = Pick<StatusStore, 'snapshot' | 'incidents'>;

export async function statusRoutes(app: FastifyInstance, status: StatusSource): Promise<void> {
  app.get('/status', async () => {
    return status.snapshot();
  });

  app.get('/incidents', async () => {
    return status.incidents();
  });
}

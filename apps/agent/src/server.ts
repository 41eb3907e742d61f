/**
 * Status server
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createChildLogger, errorMessage } from '@kubemend/shared';
import { registerRoutes } from './routes/index.js';
import type { StatusSource } from './routes/status.js';

const logger = createChildLogger({ component: 'StatusServer' });

export interface StatusServerOptions {
  status: StatusSource;
  corsOrigin: string;
}

export interface StatusServerListenOptions extends StatusServerOptions {
  port: number;
  host: string;
}

export async function createServer(options: StatusServerOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
  });

  await app.register(cors, {
    origin: options.corsOrigin === '*' ? true : options.corsOrigin.split(','),
    methods: ['GET'],
  });

  await registerRoutes(app, options.status);

  return app;
}

/**
 * Create and start the status server. A server that cannot start is
 * reported and skipped; the agent keeps running without it.
 */
export async function startStatusServer(options: StatusServerListenOptions): Promise<FastifyInstance | null> {
  const { port, host } = options;
  let app: FastifyInstance | null = null;

  try {
    app = await createServer(options);
    await app.listen({ port, host });
    logger.info(`Status server started on ${host}:${port}`);
    return app;
  } catch (error) {
    logger.warn({ port, host, error: errorMessage(error) }, 'Status server failed to start, continuing without it');
    if (app) {
      await app.close();
    }
    return null;
  }
}

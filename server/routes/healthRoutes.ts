import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { HealthResponse } from '../../shared/api-types.js';

interface HealthRoutesOptions {
  app: FastifyInstance;
  startedAtMs: number;
  now?: () => number;
}

function registerHealthRoutes(options: HealthRoutesOptions): void {
  const { app, startedAtMs } = options;
  const now = options.now ?? Date.now;

  if (!app) {
    throw new Error('registerHealthRoutes requires app');
  }

  app.get('/healthz', (_req: FastifyRequest, res: FastifyReply) => {
    const nowMs = now();
    const body: HealthResponse = {
      status: 'ok',
      uptimeSeconds: Math.floor((nowMs - startedAtMs) / 1000),
      timestamp: new Date(nowMs).toISOString(),
    };
    return res.code(200).send(body);
  });
}

export { registerHealthRoutes };

import crypto from 'crypto';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Logger } from './logger.js';

export function logStructured(logger: Logger, level: string, event: string, fields: Record<string, unknown> = {}) {
  const pinoLevel = level === 'error' ? 'error' : level === 'warn' ? 'warn' : 'info';
  logger[pinoLevel]({ event, ...fields });
}

export function createRequestId() {
  return crypto.randomUUID();
}

export function shouldLogRequestPath(pathname: string) {
  const path = String(pathname || '');
  if (path.startsWith('/api/')) return true;
  return path === '/' || path === '/healthz';
}

export function extractSafeRequestMeta(req: FastifyRequest) {
  const path = String(req.url?.split('?')[0] || '');
  const query = req.query;
  const queryKeys = query && typeof query === 'object' ? Object.keys(query) : [];
  return {
    method: req.method,
    path,
    queryKeys,
  };
}

/** One structured line per API request, with latency and status. */
export function registerRequestLogging(app: FastifyInstance, logger: Logger): void {
  const startedAt = new WeakMap<FastifyRequest, number>();

  app.addHook('onRequest', async (req) => {
    startedAt.set(req, Date.now());
  });

  app.addHook('onResponse', async (req, reply) => {
    const meta = extractSafeRequestMeta(req);
    if (!shouldLogRequestPath(meta.path)) return;
    const started = startedAt.get(req);
    const level = reply.statusCode >= 500 ? 'error' : reply.statusCode >= 400 ? 'warn' : 'info';
    logStructured(logger, level, 'http_request', {
      requestId: req.id,
      ...meta,
      status: reply.statusCode,
      durationMs: started === undefined ? null : Date.now() - started,
    });
  });
}

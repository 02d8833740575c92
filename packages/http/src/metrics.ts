import type { ServiceMetrics } from '@kyc-status/observability';
import type { FastifyInstance, FastifyRequest } from 'fastify';

export function registerServiceMetrics(app: FastifyInstance, metrics: ServiceMetrics): void {
  const startedAt = new WeakMap<FastifyRequest, number>();

  app.addHook('onRequest', async (request) => {
    startedAt.set(request, Date.now());
  });

  app.addHook('onResponse', async (request, reply) => {
    const start = startedAt.get(request) ?? Date.now();
    const duration = Math.max(Date.now() - start, 0);
    const route = request.routeOptions.url ?? 'unmatched';
    const status = String(reply.statusCode);

    metrics.requestDurationMs.labels(request.method, route, status).observe(duration);
    metrics.requestCount.labels(request.method, route, status).inc();

    if (reply.statusCode >= 400) {
      metrics.errorCount.labels(status).inc();
    }
  });

  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });
}

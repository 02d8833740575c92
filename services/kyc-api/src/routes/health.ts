import type { FastifyInstance } from 'fastify';

function runtimeVersion(service: string): Record<string, string> {
  return {
    service,
    releaseId: process.env.RELEASE_ID ?? 'dev',
    gitSha: process.env.GIT_SHA ?? 'local',
    environment: process.env.ENVIRONMENT ?? process.env.NODE_ENV ?? 'development'
  };
}

export function registerHealthRoutes(app: FastifyInstance, serviceName: string): void {
  app.get('/healthz', async () => ({ ok: true, service: serviceName }));
  app.get('/version', async () => runtimeVersion(serviceName));
}

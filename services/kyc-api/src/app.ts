import { AirtableKycRecordSource, type KycRecordSource } from '@kyc-status/adapters';
import type { KycApiServiceEnv } from '@kyc-status/config';
import { ERRORS } from '@kyc-status/domain';
import { deny, errorEnvelope, registerCors, registerServiceMetrics } from '@kyc-status/http';
import { createServiceLogger, createServiceMetrics, type ServiceLogger, type ServiceMetrics } from '@kyc-status/observability';
import Fastify, { type FastifyInstance } from 'fastify';
import { KycStatusService } from './modules/kyc-status/index.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerKycRoutes } from './routes/kyc.js';

export const SERVICE_NAME = 'kyc-api';

export interface KycApiAppOptions {
  env: KycApiServiceEnv;
  /** Replaces the Airtable source, e.g. with an in-memory one in tests. */
  recordSource?: KycRecordSource;
  metrics?: ServiceMetrics;
  logger?: ServiceLogger;
}

export function createAirtableRecordSource(
  env: KycApiServiceEnv,
  options?: { metrics?: ServiceMetrics; logger?: ServiceLogger }
): AirtableKycRecordSource {
  return new AirtableKycRecordSource(
    {
      apiKey: env.AIRTABLE_API_KEY,
      apiUrl: env.AIRTABLE_API_URL,
      baseId: env.AIRTABLE_BASE_ID,
      tableId: env.AIRTABLE_TABLE_ID,
      view: env.AIRTABLE_VIEW,
      maxRecords: env.AIRTABLE_MAX_RECORDS,
      timeoutMs: env.AIRTABLE_TIMEOUT_MS
    },
    options
  );
}

export async function buildKycApiApp(options: KycApiAppOptions): Promise<FastifyInstance> {
  const { env } = options;
  const app = Fastify({ logger: false });

  const metrics = options.metrics ?? createServiceMetrics(SERVICE_NAME);
  const logger = options.logger ?? createServiceLogger({ service: SERVICE_NAME, minLevel: env.LOG_LEVEL });
  const recordSource = options.recordSource ?? createAirtableRecordSource(env, { metrics, logger });

  await registerCors(app, { allowedOrigins: env.CORS_ALLOWED_ORIGINS, allowedMethods: ['GET', 'POST'] });
  registerServiceMetrics(app, metrics);
  registerHealthRoutes(app, SERVICE_NAME);
  registerKycRoutes(app, {
    kycStatusService: new KycStatusService(recordSource),
    logger
  });

  app.setNotFoundHandler((request, reply) =>
    deny({
      request,
      reply,
      code: ERRORS.NOT_FOUND.code,
      message: ERRORS.NOT_FOUND.message,
      status: ERRORS.NOT_FOUND.status
    })
  );

  app.setErrorHandler((error, request, reply) => {
    logger.error(`${SERVICE_NAME} unhandled error`, {
      message: error.message,
      stack: error.stack,
      requestId: request.id
    });

    return reply
      .status(ERRORS.INTERNAL_ERROR.status)
      .send(errorEnvelope(request, ERRORS.INTERNAL_ERROR.code, ERRORS.INTERNAL_ERROR.message));
  });

  return app;
}

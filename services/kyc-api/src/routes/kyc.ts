import { UpstreamSchemaMismatchError, UpstreamUnavailableError } from '@kyc-status/adapters';
import { InvalidAccountIdError } from '@kyc-status/domain';
import { deny, failPlain } from '@kyc-status/http';
import type { ServiceLogger } from '@kyc-status/observability';
import type { FastifyInstance } from 'fastify';
import { toKycStatusResponse, type KycStatusService } from '../modules/kyc-status/index.js';

export function registerKycRoutes(
  app: FastifyInstance,
  deps: {
    kycStatusService: KycStatusService;
    logger: ServiceLogger;
  }
): void {
  const { kycStatusService, logger } = deps;

  app.get<{ Params: { accountId: string } }>('/kyc/:accountId', async (request, reply) => {
    const requestLogger = logger.child({ requestId: request.id });

    try {
      const result = await kycStatusService.resolve(request.params.accountId);
      requestLogger.info('KYC status resolved', { accountId: result.accountId, kycStatus: result.kycStatus });
      return reply.status(200).send(toKycStatusResponse(result));
    } catch (error) {
      if (error instanceof InvalidAccountIdError) {
        return deny({
          request,
          reply,
          code: error.code,
          message: error.message,
          status: error.status
        });
      }

      if (error instanceof UpstreamUnavailableError || error instanceof UpstreamSchemaMismatchError) {
        requestLogger.warn('KYC status lookup failed', {
          accountId: request.params.accountId,
          code: error.code,
          details: error.details
        });
        return failPlain(reply, error.status, error.message);
      }

      throw error;
    }
  });
}

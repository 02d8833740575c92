import { log } from '@kyc-status/observability';
import type { FastifyInstance } from 'fastify';

export interface ServiceBootstrapOptions {
  serviceName: string;
  buildApp: () => Promise<FastifyInstance>;
  host: string;
  port: number;
  onShutdown?: () => Promise<void> | void;
}

export async function runService(options: ServiceBootstrapOptions): Promise<void> {
  const app = await options.buildApp();
  const { host, port } = options;

  await app.listen({ port, host });
  log('info', `${options.serviceName} listening`, { host, port });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    log('warn', `${options.serviceName} shutting down`, { signal });

    await app.close();
    await options.onShutdown?.();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      log('error', `${options.serviceName} shutdown failed`, {
        error: error instanceof Error ? error.message : String(error)
      });
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

export function runServiceAndExit(options: ServiceBootstrapOptions): void {
  runService(options).catch((error: unknown) => {
    log('error', `${options.serviceName} failed to start`, {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  });
}

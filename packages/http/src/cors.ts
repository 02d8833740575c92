import cors from '@fastify/cors';
import type { FastifyInstance } from 'fastify';

export interface CorsConfig {
  /** Allowed origins; `*` allows any origin without credentials. */
  allowedOrigins: string[];
  allowedMethods?: string[];
  allowedHeaders?: string[];
  exposedHeaders?: string[];
  credentials?: boolean;
  /** Preflight cache duration in seconds. */
  maxAge?: number;
}

export function isOriginAllowed(origin: string | undefined, allowedOrigins: string[]): boolean {
  if (!origin) return false;
  if (allowedOrigins.includes('*')) return true;

  return allowedOrigins.some((allowed) => {
    if (allowed.startsWith('*.')) {
      const domain = allowed.slice(2);
      return origin.endsWith(domain) && origin.charAt(origin.length - domain.length - 1) === '.';
    }
    return origin === allowed;
  });
}

export async function registerCors(app: FastifyInstance, config: CorsConfig): Promise<void> {
  const {
    allowedOrigins,
    allowedMethods = ['GET', 'POST'],
    allowedHeaders = ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposedHeaders = ['X-Request-Id'],
    credentials = false,
    maxAge = 86_400
  } = config;

  if (allowedOrigins.length === 0) {
    return;
  }

  const anyOrigin = allowedOrigins.includes('*');

  await app.register(cors, {
    origin: anyOrigin
      ? '*'
      : (origin: string | undefined, callback: (err: Error | null, allow: boolean) => void) => {
          callback(null, isOriginAllowed(origin, allowedOrigins));
        },
    methods: allowedMethods,
    allowedHeaders,
    exposedHeaders,
    credentials: anyOrigin ? false : credentials,
    maxAge
  });
}

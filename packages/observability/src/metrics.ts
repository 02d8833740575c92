import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type UpstreamOutcome = 'ok' | 'unavailable' | 'schema_mismatch';

export interface UpstreamMetrics {
  upstreamDurationMs: Histogram<string>;
  upstreamRequestCount: Counter<string>;
}

export interface ServiceMetrics extends UpstreamMetrics {
  registry: Registry;
  requestDurationMs: Histogram<string>;
  requestCount: Counter<string>;
  errorCount: Counter<string>;
  buildInfo: Gauge<string>;
}

export function createServiceMetrics(serviceName: string): ServiceMetrics {
  const registry = new Registry();
  const prefix = serviceName.replaceAll('-', '_');

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 2000],
    registers: [registry]
  });

  const requestCount = new Counter({
    name: `${prefix}_request_total`,
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry]
  });

  const errorCount = new Counter({
    name: `${prefix}_error_total`,
    help: 'Total errors',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const upstreamDurationMs = new Histogram({
    name: `${prefix}_upstream_request_duration_ms`,
    help: 'Outbound request duration in milliseconds',
    labelNames: ['upstream', 'outcome'] as const,
    buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000],
    registers: [registry]
  });

  const upstreamRequestCount = new Counter({
    name: `${prefix}_upstream_request_total`,
    help: 'Total outbound requests by outcome',
    labelNames: ['upstream', 'outcome'] as const,
    registers: [registry]
  });

  const buildInfo = new Gauge({
    name: `${prefix}_build_info`,
    help: 'Build and deployment metadata for this running service',
    labelNames: ['release_id', 'git_sha', 'environment'] as const,
    registers: [registry]
  });

  buildInfo
    .labels(
      process.env.RELEASE_ID ?? 'dev',
      process.env.GIT_SHA ?? 'local',
      process.env.ENVIRONMENT ?? process.env.NODE_ENV ?? 'development'
    )
    .set(1);

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount,
    upstreamDurationMs,
    upstreamRequestCount,
    buildInfo
  };
}

export function recordUpstreamCall(
  metrics: UpstreamMetrics | undefined,
  upstream: string,
  outcome: UpstreamOutcome,
  durationMs: number
): void {
  if (!metrics) {
    return;
  }

  metrics.upstreamDurationMs.labels(upstream, outcome).observe(durationMs);
  metrics.upstreamRequestCount.labels(upstream, outcome).inc();
}

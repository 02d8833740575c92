export { log, type LogLevel } from './logger.js';
export {
  createServiceLogger,
  redactMetadata,
  DEFAULT_REDACT_FIELDS,
  type ServiceLogger,
  type ServiceLoggerConfig
} from './service-logger.js';
export {
  createServiceMetrics,
  recordUpstreamCall,
  type ServiceMetrics,
  type UpstreamMetrics,
  type UpstreamOutcome
} from './metrics.js';

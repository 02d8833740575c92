export { registerCors, isOriginAllowed, type CorsConfig } from './cors.js';
export { errorEnvelope, deny, failPlain } from './errors.js';
export { registerServiceMetrics } from './metrics.js';
export { runService, runServiceAndExit, type ServiceBootstrapOptions } from './bootstrap.js';

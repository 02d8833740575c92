export { loadKycApiServiceEnv, type KycApiServiceEnv } from './env.js';

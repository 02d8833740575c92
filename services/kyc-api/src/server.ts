import { loadKycApiServiceEnv, type KycApiServiceEnv } from '@kyc-status/config';
import { runServiceAndExit } from '@kyc-status/http';
import { log } from '@kyc-status/observability';
import { buildKycApiApp, SERVICE_NAME } from './app.js';

let env: KycApiServiceEnv;
try {
  env = loadKycApiServiceEnv();
} catch (error) {
  log('error', `${SERVICE_NAME} configuration is invalid`, {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
}

runServiceAndExit({
  serviceName: SERVICE_NAME,
  buildApp: () => buildKycApiApp({ env }),
  host: env.KYC_API_HOST,
  port: env.KYC_API_PORT
});

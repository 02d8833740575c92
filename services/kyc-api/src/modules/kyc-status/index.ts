export { KycStatusService } from './service.js';
export { toKycStatusResponse, type KycStatusResponse, type KycStatusResult } from './types.js';

import type { KycStatus } from '@kyc-status/domain';

export interface KycStatusResult {
  accountId: string;
  kycStatus: KycStatus;
}

/** Wire shape of `GET /kyc/:accountId`. */
export interface KycStatusResponse {
  account_id: string;
  kyc_status: KycStatus;
}

export function toKycStatusResponse(result: KycStatusResult): KycStatusResponse {
  return {
    account_id: result.accountId,
    kyc_status: result.kycStatus
  };
}

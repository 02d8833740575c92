import type { KycRecordSource } from '@kyc-status/adapters';
import { checkAccountId, InvalidAccountIdError, selectKycStatus } from '@kyc-status/domain';
import type { KycStatusResult } from './types.js';

export class KycStatusService {
  constructor(private readonly records: KycRecordSource) {}

  /**
   * Resolves the KYC status of one account with a single record lookup.
   * Invalid ids are rejected before the lookup; upstream errors propagate as-is.
   */
  async resolve(accountId: string): Promise<KycStatusResult> {
    const check = checkAccountId(accountId);
    if (!check.ok) {
      throw new InvalidAccountIdError(check.reason);
    }

    const records = await this.records.findRecordsByAccountId(check.accountId);

    return {
      accountId: check.accountId,
      kycStatus: selectKycStatus(records)
    };
  }
}

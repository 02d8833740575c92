import { UpstreamUnavailableError, type KycRecordSource } from '@kyc-status/adapters';
import { InvalidAccountIdError, type KycRecordFields } from '@kyc-status/domain';
import { describe, expect, it } from 'vitest';
import { KycStatusService } from '../src/modules/kyc-status/index.js';

class InMemoryKycRecordSource implements KycRecordSource {
  readonly lookups: string[] = [];

  constructor(private readonly byAccount: Record<string, KycRecordFields[]> = {}) {}

  async findRecordsByAccountId(accountId: string): Promise<KycRecordFields[]> {
    this.lookups.push(accountId);
    return this.byAccount[accountId] ?? [];
  }
}

describe('KycStatusService unit', () => {
  it('resolves NOT_SUBMITTED when no records match', async () => {
    const source = new InMemoryKycRecordSource();
    const service = new KycStatusService(source);

    await expect(service.resolve('alice.near')).resolves.toEqual({ accountId: 'alice.near', kycStatus: 'NOT_SUBMITTED' });
    expect(source.lookups).toEqual(['alice.near']);
  });

  it('approves an account with a verified record', async () => {
    const service = new KycStatusService(
      new InMemoryKycRecordSource({
        'alice.near': [{ ownerVerificationStatus: 'Verified', approvalStanding: ['Approved'] }]
      })
    );

    await expect(service.resolve('alice.near')).resolves.toEqual({ accountId: 'alice.near', kycStatus: 'APPROVED' });
  });

  it('picks the active record over an earlier pending one', async () => {
    const service = new KycStatusService(
      new InMemoryKycRecordSource({
        'alice.near': [
          { ownerVerificationStatus: 'Pending', approvalStanding: [] },
          { ownerVerificationStatus: 'Verified', approvalStanding: [] }
        ]
      })
    );

    await expect(service.resolve('alice.near')).resolves.toEqual({ accountId: 'alice.near', kycStatus: 'APPROVED' });
  });

  it('rejects invalid account ids before the lookup', async () => {
    const source = new InMemoryKycRecordSource();
    const service = new KycStatusService(source);

    await expect(service.resolve("alice') & TRUE() & ('")).rejects.toBeInstanceOf(InvalidAccountIdError);
    expect(source.lookups).toEqual([]);
  });

  it('propagates upstream failures', async () => {
    const service = new KycStatusService({
      findRecordsByAccountId: async () => {
        throw new UpstreamUnavailableError('Airtable responded with status 503');
      }
    });

    await expect(service.resolve('alice.near')).rejects.toThrow('Database error');
  });
});

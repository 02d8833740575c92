import type { KycRecordFields } from '@kyc-status/domain';

export interface AirtableClientConfig {
    apiKey: string;
    /** API root, e.g. `https://api.airtable.com/v0`. */
    apiUrl: string;
    baseId: string;
    tableId: string;
    view: string;
    maxRecords: number;
    timeoutMs: number;
}

export interface KycRecordSource {
    /** Verification records whose wallet address matches the account, in store order. */
    findRecordsByAccountId(accountId: string): Promise<KycRecordFields[]>;
}

import { buildWalletAddressFormula } from '@kyc-status/domain';
import { createServiceMetrics } from '@kyc-status/observability';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { AirtableKycRecordSource } from '../src/airtable/client.js';
import { UpstreamSchemaMismatchError, UpstreamUnavailableError } from '../src/airtable/errors.js';
import type { AirtableClientConfig } from '../src/airtable/types.js';

const config: AirtableClientConfig = {
    apiKey: 'test-secret',
    apiUrl: 'https://api.airtable.test/v0/',
    baseId: 'appTest',
    tableId: 'tblTest',
    view: 'Grid view',
    maxRecords: 5,
    timeoutMs: 1_000
};

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' }
    });
}

function stubFetch(impl: (input: string | URL | Request, init?: RequestInit) => Promise<Response>) {
    const fetchMock = vi.fn(impl);
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('Expected promise to reject.');
}

describe('AirtableKycRecordSource', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('builds the list-records url with an escaped filter formula', () => {
        const source = new AirtableKycRecordSource(config);
        const url = source.buildRequestUrl('alice.near');

        expect(url.startsWith('https://api.airtable.test/v0/appTest/tblTest?maxRecords=5&view=Grid%20view&filterByFormula=')).toBe(
            true
        );
        expect(new URL(url).searchParams.get('filterByFormula')).toBe(buildWalletAddressFormula('alice.near'));
    });

    it('sends the bearer key and maps verification fields', async () => {
        const fetchMock = stubFetch(async () =>
            jsonResponse({
                records: [
                    {
                        id: 'recA',
                        createdTime: '2025-04-21T01:50:06.000Z',
                        fields: {
                            'Wallet Address': 'alice.near',
                            Chain: 'NEAR',
                            'Owner Verification Status': 'Verified',
                            'KYC Approval Standing (from Contact)': ['Approved'],
                            'Final Status': 'Verified'
                        }
                    },
                    {
                        id: 'recB',
                        fields: {
                            'Owner Verification Status': 'Pending'
                        }
                    }
                ]
            })
        );

        const records = await new AirtableKycRecordSource(config).findRecordsByAccountId('alice.near');

        expect(records).toEqual([
            { ownerVerificationStatus: 'Verified', approvalStanding: ['Approved'] },
            { ownerVerificationStatus: 'Pending', approvalStanding: [] }
        ]);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const init = fetchMock.mock.calls[0]?.[1];
        expect(init?.method).toBe('GET');
        expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', Accept: 'application/json' });
        expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('accepts a flattened standing value', async () => {
        stubFetch(async () =>
            jsonResponse({
                records: [
                    {
                        id: 'recA',
                        fields: { 'Owner Verification Status': 'Verified', 'KYC Approval Standing (from Contact)': 'Expired' }
                    }
                ]
            })
        );

        const records = await new AirtableKycRecordSource(config).findRecordsByAccountId('alice.near');

        expect(records).toEqual([{ ownerVerificationStatus: 'Verified', approvalStanding: ['Expired'] }]);
    });

    it('returns no records for an empty result', async () => {
        stubFetch(async () => jsonResponse({ records: [] }));

        await expect(new AirtableKycRecordSource(config).findRecordsByAccountId('alice.near')).resolves.toEqual([]);
    });

    it('reports a non-2xx status as unavailable and records the outcome', async () => {
        stubFetch(async () => jsonResponse({ error: { type: 'AUTHENTICATION_REQUIRED' } }, 401));
        const metrics = createServiceMetrics('kyc-api');

        const error = await captureError(new AirtableKycRecordSource(config, { metrics }).findRecordsByAccountId('alice.near'));

        expect(error).toBeInstanceOf(UpstreamUnavailableError);
        expect(error).toHaveProperty('message', 'Database error');
        expect(error).toHaveProperty('details', { reason: 'Airtable responded with status 401' });
        expect(await metrics.registry.metrics()).toContain(
            'kyc_api_upstream_request_total{upstream="airtable",outcome="unavailable"} 1'
        );
    });

    it('reports a transport failure as unavailable', async () => {
        stubFetch(async () => {
            throw new TypeError('fetch failed');
        });

        const error = await captureError(new AirtableKycRecordSource(config).findRecordsByAccountId('alice.near'));

        expect(error).toBeInstanceOf(UpstreamUnavailableError);
        expect(error).toHaveProperty('details', { reason: 'TypeError: fetch failed' });
    });

    it('aborts a slow request after the configured timeout', async () => {
        stubFetch(
            (_input, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
                })
        );

        const error = await captureError(
            new AirtableKycRecordSource({ ...config, timeoutMs: 20 }).findRecordsByAccountId('alice.near')
        );

        expect(error).toBeInstanceOf(UpstreamUnavailableError);
        expect(error).toHaveProperty('details', { reason: 'timed out after 20ms' });
    });

    it('reports a non-JSON body as a schema mismatch', async () => {
        stubFetch(async () => new Response('<html>maintenance</html>', { status: 200 }));

        const error = await captureError(new AirtableKycRecordSource(config).findRecordsByAccountId('alice.near'));

        expect(error).toBeInstanceOf(UpstreamSchemaMismatchError);
        expect(error).toHaveProperty('message', 'Deserialization error');
        expect(error).toHaveProperty('details', { reason: 'Response body is not JSON.' });
    });

    it('reports a record without the status field as a schema mismatch', async () => {
        stubFetch(async () => jsonResponse({ records: [{ id: 'recA', fields: { 'Wallet Address': 'alice.near' } }] }));
        const metrics = createServiceMetrics('kyc-api');

        const error = await captureError(new AirtableKycRecordSource(config, { metrics }).findRecordsByAccountId('alice.near'));

        expect(error).toBeInstanceOf(UpstreamSchemaMismatchError);
        expect(error).toHaveProperty('details', { reason: 'records.0.fields.Owner Verification Status: Required' });
        expect(await metrics.registry.metrics()).toContain(
            'kyc_api_upstream_request_total{upstream="airtable",outcome="schema_mismatch"} 1'
        );
    });

    it('rejects status values outside the verification vocabulary', async () => {
        stubFetch(async () => jsonResponse({ records: [{ id: 'recA', fields: { 'Owner Verification Status': 'Approved' } }] }));

        await expect(new AirtableKycRecordSource(config).findRecordsByAccountId('alice.near')).rejects.toBeInstanceOf(
            UpstreamSchemaMismatchError
        );
    });
});

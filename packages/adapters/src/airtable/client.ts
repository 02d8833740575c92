import { buildWalletAddressFormula, type KycRecordFields } from '@kyc-status/domain';
import { recordUpstreamCall, type ServiceLogger, type UpstreamMetrics, type UpstreamOutcome } from '@kyc-status/observability';
import { UpstreamSchemaMismatchError, UpstreamUnavailableError } from './errors.js';
import { airtableListResponseSchema, toKycRecordFields } from './schema.js';
import type { AirtableClientConfig, KycRecordSource } from './types.js';

const UPSTREAM = 'airtable';

function errorName(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
        return error.name;
    }
    return undefined;
}

function isAbort(error: unknown): boolean {
    const name = errorName(error);
    return name === 'TimeoutError' || name === 'AbortError';
}

function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Verification records from the Airtable REST API.
 * One GET per lookup, bounded by `timeoutMs`; no caching and no retries.
 * @see https://airtable.com/developers/web/api/list-records
 */
export class AirtableKycRecordSource implements KycRecordSource {
    private readonly config: Readonly<AirtableClientConfig>;
    private readonly metrics: UpstreamMetrics | undefined;
    private readonly logger: ServiceLogger | undefined;

    constructor(config: AirtableClientConfig, options?: { metrics?: UpstreamMetrics; logger?: ServiceLogger }) {
        this.config = Object.freeze({ ...config, apiUrl: config.apiUrl.replace(/\/+$/, '') });
        this.metrics = options?.metrics;
        this.logger = options?.logger;
    }

    buildRequestUrl(accountId: string): string {
        const { apiUrl, baseId, tableId, view, maxRecords } = this.config;
        const params: Array<[string, string]> = [
            ['maxRecords', String(maxRecords)],
            ['view', view],
            ['filterByFormula', buildWalletAddressFormula(accountId)]
        ];
        const query = params.map(([key, value]) => `${key}=${encodeURIComponent(value)}`).join('&');

        return `${apiUrl}/${encodeURIComponent(baseId)}/${encodeURIComponent(tableId)}?${query}`;
    }

    async findRecordsByAccountId(accountId: string): Promise<KycRecordFields[]> {
        const startedAt = Date.now();
        const finish = (outcome: UpstreamOutcome): void => {
            recordUpstreamCall(this.metrics, UPSTREAM, outcome, Math.max(Date.now() - startedAt, 0));
        };

        let response: Response;
        try {
            response = await fetch(this.buildRequestUrl(accountId), {
                method: 'GET',
                headers: {
                    Authorization: `Bearer ${this.config.apiKey}`,
                    Accept: 'application/json'
                },
                signal: AbortSignal.timeout(this.config.timeoutMs)
            });
        } catch (error) {
            finish('unavailable');
            const reason = isAbort(error) ? `timed out after ${this.config.timeoutMs}ms` : describeError(error);
            this.logger?.warn('Airtable request failed', { accountId, reason });
            throw new UpstreamUnavailableError(reason, { cause: error });
        }

        if (!response.ok) {
            finish('unavailable');
            this.logger?.warn('Airtable responded with an error status', { accountId, status: response.status });
            throw new UpstreamUnavailableError(`Airtable responded with status ${response.status}`);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            if (isAbort(error)) {
                finish('unavailable');
                this.logger?.warn('Airtable response body timed out', { accountId });
                throw new UpstreamUnavailableError(`timed out after ${this.config.timeoutMs}ms`, { cause: error });
            }

            finish('schema_mismatch');
            this.logger?.warn('Airtable response is not JSON', { accountId, reason: describeError(error) });
            throw new UpstreamSchemaMismatchError('Response body is not JSON.', { cause: error });
        }

        const parsed = airtableListResponseSchema.safeParse(body);
        if (!parsed.success) {
            finish('schema_mismatch');
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
            this.logger?.warn('Airtable response does not match the verification schema', { accountId, issues });
            throw new UpstreamSchemaMismatchError(issues[0] ?? 'Unexpected response shape.', { cause: parsed.error });
        }

        finish('ok');
        this.logger?.debug('Airtable records fetched', { accountId, recordCount: parsed.data.records.length });
        return toKycRecordFields(parsed.data);
    }
}

import { ApiError, ERRORS } from '@kyc-status/domain';

/** Transport failure, timeout or non-2xx status from Airtable. Not retried. */
export class UpstreamUnavailableError extends ApiError {
    constructor(reason: string, options?: { cause?: unknown }) {
        super(ERRORS.UPSTREAM_UNAVAILABLE, { reason }, options);
        this.name = 'UpstreamUnavailableError';
    }
}

/** Airtable answered, but the body does not match the verification table schema. */
export class UpstreamSchemaMismatchError extends ApiError {
    constructor(reason: string, options?: { cause?: unknown }) {
        super(ERRORS.UPSTREAM_SCHEMA_MISMATCH, { reason }, options);
        this.name = 'UpstreamSchemaMismatchError';
    }
}

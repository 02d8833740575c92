/**
 * Structured API Error Codes
 *
 * Central registry for the error responses of the KYC status service. Each
 * entry has a unique code, default HTTP status and the message sent to callers.
 */

export interface ApiErrorDefinition {
    code: string;
    status: number;
    message: string;
}

/** Structured API error that can be thrown from any route handler. */
export class ApiError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: unknown;

    constructor(def: ApiErrorDefinition, details?: unknown, options?: { cause?: unknown }) {
        super(def.message, options);
        this.name = 'ApiError';
        this.code = def.code;
        this.status = def.status;
        this.details = details;
    }
}

export const ERRORS = {
    // ── Validation ──
    INVALID_ACCOUNT_ID: { code: 'INVALID_ACCOUNT_ID', status: 400, message: 'Invalid account id.' },
    NOT_FOUND: { code: 'NOT_FOUND', status: 404, message: 'Resource not found.' },

    // ── Upstream ──
    UPSTREAM_UNAVAILABLE: { code: 'UPSTREAM_UNAVAILABLE', status: 500, message: 'Database error' },
    UPSTREAM_SCHEMA_MISMATCH: { code: 'UPSTREAM_SCHEMA_MISMATCH', status: 500, message: 'Deserialization error' },

    // ── Internal ──
    INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500, message: 'An unexpected internal error occurred.' }
} as const satisfies Record<string, ApiErrorDefinition>;

export class InvalidAccountIdError extends ApiError {
    constructor(reason: string) {
        super({ ...ERRORS.INVALID_ACCOUNT_ID, message: reason });
        this.name = 'InvalidAccountIdError';
    }
}

import { EXPIRED_STANDING, type KycStatus, type OwnerVerificationStatus } from './constants.js';

/** Status-bearing fields of one verification record, already validated. */
export interface KycRecordFields {
    ownerVerificationStatus: OwnerVerificationStatus;
    /** Lookup values from the linked contact; empty when the cell is blank. */
    approvalStanding: readonly string[];
}

export interface NormalizedRecordStatus {
    status: KycStatus;
    active: boolean;
}

const OWNER_STATUS_TABLE: Record<OwnerVerificationStatus, KycStatus> = {
    Verified: 'APPROVED',
    Rejected: 'REJECTED',
    Pending: 'PENDING',
    Expired: 'EXPIRED',
    'Not Submitted': 'NOT_SUBMITTED'
};

export function mapOwnerVerificationStatus(value: OwnerVerificationStatus): KycStatus {
    return OWNER_STATUS_TABLE[value];
}

export function hasExpiredStanding(standing: readonly string[]): boolean {
    return standing.some((value) => value.trim().toLowerCase() === EXPIRED_STANDING);
}

/**
 * Reduces one record to a resolved status.
 *
 * | Owner Verification Status | standing `Expired` | status        | active |
 * | ------------------------- | ------------------ | ------------- | ------ |
 * | Verified                  | no                 | APPROVED      | yes    |
 * | Verified                  | yes                | EXPIRED       | no     |
 * | Rejected                  | any                | REJECTED      | no     |
 * | Pending                   | any                | PENDING       | no     |
 * | Expired                   | any                | EXPIRED       | no     |
 * | Not Submitted             | any                | NOT_SUBMITTED | no     |
 */
export function normalizeRecordStatus(fields: KycRecordFields): NormalizedRecordStatus {
    const status = mapOwnerVerificationStatus(fields.ownerVerificationStatus);

    if (status === 'APPROVED' && hasExpiredStanding(fields.approvalStanding)) {
        return { status: 'EXPIRED', active: false };
    }

    return { status, active: status === 'APPROVED' };
}

/**
 * Picks the status for an account from its matching records, in store order:
 * the first active record wins, otherwise the first record decides, and no
 * records at all means the account never submitted.
 */
export function selectKycStatus(records: readonly KycRecordFields[]): KycStatus {
    const normalized = records.map(normalizeRecordStatus);

    const active = normalized.find((record) => record.active);
    if (active) {
        return active.status;
    }

    return normalized[0]?.status ?? 'NOT_SUBMITTED';
}

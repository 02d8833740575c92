/** Resolved KYC status, serialized as these SCREAMING_SNAKE_CASE tokens. */
export const KYC_STATUSES = ['NOT_SUBMITTED', 'PENDING', 'REJECTED', 'APPROVED', 'EXPIRED'] as const;
export type KycStatus = (typeof KYC_STATUSES)[number];

/** Values of the `Owner Verification Status` column in the verification table. */
export const OWNER_VERIFICATION_STATUSES = ['Verified', 'Rejected', 'Pending', 'Expired', 'Not Submitted'] as const;
export type OwnerVerificationStatus = (typeof OWNER_VERIFICATION_STATUSES)[number];

export const WALLET_ADDRESS_FIELD = 'Wallet Address';
export const OWNER_VERIFICATION_STATUS_FIELD = 'Owner Verification Status';
export const APPROVAL_STANDING_FIELD = 'KYC Approval Standing (from Contact)';

export const EXPIRED_STANDING = 'expired';

export const ACCOUNT_ID_MIN_LENGTH = 2;
export const ACCOUNT_ID_MAX_LENGTH = 64;

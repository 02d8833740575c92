export {
    KYC_STATUSES,
    OWNER_VERIFICATION_STATUSES,
    WALLET_ADDRESS_FIELD,
    OWNER_VERIFICATION_STATUS_FIELD,
    APPROVAL_STANDING_FIELD,
    ACCOUNT_ID_MAX_LENGTH,
    ACCOUNT_ID_MIN_LENGTH,
    type KycStatus,
    type OwnerVerificationStatus
} from './constants.js';
export {
    hasExpiredStanding,
    mapOwnerVerificationStatus,
    normalizeRecordStatus,
    selectKycStatus,
    type KycRecordFields,
    type NormalizedRecordStatus
} from './kyc-status.js';
export { accountIdSchema, checkAccountId, type AccountIdCheck } from './account-id.js';
export { buildWalletAddressFormula, escapeFormulaString, escapeRegexLiteral } from './formula.js';
export { ApiError, ERRORS, InvalidAccountIdError, type ApiErrorDefinition } from './errors.js';

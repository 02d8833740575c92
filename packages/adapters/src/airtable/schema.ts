import {
    APPROVAL_STANDING_FIELD,
    OWNER_VERIFICATION_STATUS_FIELD,
    OWNER_VERIFICATION_STATUSES,
    type KycRecordFields
} from '@kyc-status/domain';
import { z } from 'zod';

// Lookup cells arrive as arrays; older exports flattened them to a single string.
const standingSchema = z
    .union([z.array(z.string()), z.string()])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

const verificationFieldsSchema = z.object({
    [OWNER_VERIFICATION_STATUS_FIELD]: z.enum(OWNER_VERIFICATION_STATUSES),
    [APPROVAL_STANDING_FIELD]: standingSchema
});

export const airtableListResponseSchema = z.object({
    records: z.array(
        z.object({
            id: z.string(),
            createdTime: z.string().optional(),
            fields: verificationFieldsSchema
        })
    ),
    offset: z.string().optional()
});

export type AirtableListResponse = z.infer<typeof airtableListResponseSchema>;

export function toKycRecordFields(response: AirtableListResponse): KycRecordFields[] {
    return response.records.map((record) => ({
        ownerVerificationStatus: record.fields[OWNER_VERIFICATION_STATUS_FIELD],
        approvalStanding: record.fields[APPROVAL_STANDING_FIELD]
    }));
}

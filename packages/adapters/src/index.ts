export {
    AirtableKycRecordSource,
    UpstreamSchemaMismatchError,
    UpstreamUnavailableError,
    airtableListResponseSchema,
    toKycRecordFields,
    type AirtableClientConfig,
    type AirtableListResponse,
    type KycRecordSource
} from './airtable/index.js';

export { AirtableKycRecordSource } from './client.js';
export { UpstreamSchemaMismatchError, UpstreamUnavailableError } from './errors.js';
export { airtableListResponseSchema, toKycRecordFields, type AirtableListResponse } from './schema.js';
export type { AirtableClientConfig, KycRecordSource } from './types.js';

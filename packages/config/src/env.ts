import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

const originList = z
  .preprocess(emptyStringToUndefined, z.string().default('*'))
  .transform((value) =>
    value
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0)
  );

const kycApiSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.preprocess(emptyStringToUndefined, z.enum(['debug', 'info', 'warn', 'error']).optional()),
  AIRTABLE_API_KEY: z.preprocess(
    emptyStringToUndefined,
    z.string({ required_error: 'AIRTABLE_API_KEY was not found.' }).min(1)
  ),
  AIRTABLE_API_URL: z.string().url().default('https://api.airtable.com/v0'),
  AIRTABLE_BASE_ID: z.string().min(1).default('appc0ZVhbKj8hMLvH'),
  AIRTABLE_TABLE_ID: z.string().min(1).default('tblIxT2t2gHoZMucn'),
  AIRTABLE_VIEW: z.string().min(1).default('Grid view'),
  AIRTABLE_MAX_RECORDS: z.coerce.number().int().min(1).max(100).default(5),
  AIRTABLE_TIMEOUT_MS: z.coerce.number().int().positive().max(60_000).default(8_000),
  CORS_ALLOWED_ORIGINS: originList,
  KYC_API_HOST: z.string().trim().min(1).default('0.0.0.0'),
  KYC_API_PORT: z.coerce.number().int().min(1).max(65_535).default(3000)
});

export type KycApiServiceEnv = z.infer<typeof kycApiSchema>;

export function loadKycApiServiceEnv(input: NodeJS.ProcessEnv = process.env): KycApiServiceEnv {
  return kycApiSchema.parse(input);
}

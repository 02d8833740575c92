import { z } from 'zod';
import { ACCOUNT_ID_MAX_LENGTH, ACCOUNT_ID_MIN_LENGTH } from './constants.js';

const ACCOUNT_ID_PATTERN = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/;

/**
 * NEAR account id: lowercase alphanumerics separated by single `-`, `_` or `.`.
 * Implicit (64 hex) and `0x` prefixed accounts satisfy the same rule.
 */
export const accountIdSchema = z
  .string()
  .min(ACCOUNT_ID_MIN_LENGTH, `Account id must be at least ${ACCOUNT_ID_MIN_LENGTH} characters.`)
  .max(ACCOUNT_ID_MAX_LENGTH, `Account id must be at most ${ACCOUNT_ID_MAX_LENGTH} characters.`)
  .regex(
    ACCOUNT_ID_PATTERN,
    'Account id may only contain lowercase letters, digits and single -, _ or . separators.'
  );

export type AccountIdCheck = { ok: true; accountId: string } | { ok: false; reason: string };

export function checkAccountId(value: unknown): AccountIdCheck {
  const parsed = accountIdSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues[0]?.message ?? 'Invalid account id.' };
  }
  return { ok: true, accountId: parsed.data };
}

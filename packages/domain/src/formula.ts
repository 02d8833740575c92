import { WALLET_ADDRESS_FIELD } from './constants.js';

const REGEX_METACHARACTERS = /[\\^$.|?*+()[\]{}]/g;
const FORMULA_STRING_SPECIALS = /[\\']/g;

export function escapeRegexLiteral(value: string): string {
  return value.replace(REGEX_METACHARACTERS, '\\$&');
}

/** Escapes text for use inside a single-quoted formula string literal. */
export function escapeFormulaString(value: string): string {
  return value.replace(FORMULA_STRING_SPECIALS, '\\$&');
}

/**
 * Formula matching records whose wallet address cell holds the account id,
 * alone or as one entry of a comma separated list.
 */
export function buildWalletAddressFormula(accountId: string, field: string = WALLET_ADDRESS_FIELD): string {
  const pattern = `(^|,\\s*)${escapeRegexLiteral(accountId)}(\\s*,|$)`;
  return `REGEX_MATCH({${field}}, '${escapeFormulaString(pattern)}')`;
}

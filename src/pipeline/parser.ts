/**
 * IBAN Parser
 * Runs the ordered validation steps and reports the first failure
 */

import {
  IBANErrorCode,
  mergeParseOptions,
  type IBANValidationFailure,
  type ParseOptions,
  type ParseResult,
} from '../types/index.js';
import { lookupCountryLength } from '../registry/countries.js';
import { isValidChecksum } from '../utils/mod97.js';
import { hasSurroundingWhitespace, normalizeInput } from './normalize.js';

/**
 * General IBAN shape: country code, check digits, 1-30 alphanumeric BBAN characters
 */
export const IBAN_STRUCTURE_PATTERN = /^[A-Z]{2}[0-9]{2}[A-Z0-9]{1,30}$/;

function fail(failure: IBANValidationFailure): ParseResult<string> {
  return { ok: false, failure };
}

/**
 * Validates a candidate IBAN string.
 *
 * Steps, in order: null check, surrounding whitespace, normalization,
 * structure, country lookup, country length, checksum.
 *
 * @param input - Candidate exactly as received
 * @param options - Accepted input forms (strict by default)
 * @returns The normalized IBAN, or the first failure
 */
export function validateIBANString(
  input: string | null | undefined,
  options: Partial<ParseOptions> = {}
): ParseResult<string> {
  if (input === null || input === undefined) {
    return fail({ code: IBANErrorCode.MALFORMED_STRUCTURE, reason: 'NULL_INPUT', input: null });
  }

  if (hasSurroundingWhitespace(input)) {
    return fail({ code: IBANErrorCode.MALFORMED_STRUCTURE, reason: 'SURROUNDING_WHITESPACE', input });
  }

  const normalized = normalizeInput(input, mergeParseOptions(options));

  if (!IBAN_STRUCTURE_PATTERN.test(normalized)) {
    return fail({ code: IBANErrorCode.MALFORMED_STRUCTURE, reason: 'INVALID_STRUCTURE', input });
  }

  const countryCode = normalized.slice(0, 2);
  const expectedLength = lookupCountryLength(countryCode);
  if (expectedLength === undefined) {
    return fail({ code: IBANErrorCode.UNKNOWN_COUNTRY_CODE, input, countryCode });
  }

  if (normalized.length !== expectedLength) {
    return fail({
      code: IBANErrorCode.MALFORMED_STRUCTURE,
      reason: 'WRONG_LENGTH',
      input,
      countryCode,
      expectedLength,
      actualLength: normalized.length,
    });
  }

  if (!isValidChecksum(normalized)) {
    return fail({ code: IBANErrorCode.WRONG_CHECKSUM, input });
  }

  return { ok: true, value: normalized };
}

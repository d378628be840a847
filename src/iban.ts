/**
 * IBAN Value Object
 * Immutable, validated International Bank Account Number
 */

import { toFormatError, type ParseOptions, type ParseResult } from './types/index.js';
import { validateIBANString } from './pipeline/parser.js';
import { getLengthForCountryCode, isSEPACountry } from './registry/countries.js';
import { formatIBAN } from './utils/format.js';

/**
 * A validated IBAN.
 *
 * Instances only come out of {@link IBAN.parse}, {@link IBAN.valueOf} and
 * {@link IBAN.tryParse}, so every instance has a valid structure, the
 * registered length for its country and a correct checksum.
 *
 * @example
 * ```typescript
 * const iban = IBAN.parse('NL91ABNA0417164300');
 * iban.getCountryCode(); // 'NL'
 * iban.toString();       // 'NL91 ABNA 0417 1643 00'
 * ```
 */
export class IBAN {
  private readonly value: string;

  private constructor(normalized: string) {
    this.value = normalized;
    Object.freeze(this);
  }

  /**
   * Parses and validates an IBAN, without the exception.
   */
  static tryParse(
    input: string | null | undefined,
    options: Partial<ParseOptions> = {}
  ): ParseResult<IBAN> {
    const result = validateIBANString(input, options);
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: new IBAN(result.value) };
  }

  /**
   * Parses and validates an IBAN.
   * @throws IBANFormatError for null or malformed input, with the subclasses
   * UnknownCountryCodeError and WrongChecksumError for those two failures
   */
  static parse(input: string | null | undefined, options: Partial<ParseOptions> = {}): IBAN {
    const result = IBAN.tryParse(input, options);
    if (!result.ok) {
      throw toFormatError(result.failure);
    }
    return result.value;
  }

  /**
   * Like {@link IBAN.parse}, but returns null instead of throwing, both for
   * null input and for input that fails validation.
   */
  static valueOf(input: string | null | undefined, options: Partial<ParseOptions> = {}): IBAN | null {
    const result = IBAN.tryParse(input, options);
    return result.ok ? result.value : null;
  }

  static isValid(input: string | null | undefined, options: Partial<ParseOptions> = {}): boolean {
    return validateIBANString(input, options).ok;
  }

  /**
   * Registered IBAN length for a country code, or -1.
   * Case-sensitive: 'nl' is not 'NL'.
   */
  static getLengthForCountryCode(countryCode: string): number {
    return getLengthForCountryCode(countryCode);
  }

  getCountryCode(): string {
    return this.value.slice(0, 2);
  }

  getCheckDigits(): string {
    return this.value.slice(2, 4);
  }

  /** Basic Bank Account Number: everything after the check digits */
  getBBAN(): string {
    return this.value.slice(4);
  }

  isSEPA(): boolean {
    return isSEPACountry(this.getCountryCode());
  }

  toNormalizedString(): string {
    return this.value;
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    return other instanceof IBAN && other.value === this.value;
  }

  /**
   * 32-bit string hash of the normalized value; equal IBANs hash equally
   */
  hashCode(): number {
    let hash = 0;
    for (let i = 0; i < this.value.length; i++) {
      hash = (Math.imul(31, hash) + this.value.charCodeAt(i)) | 0;
    }
    return hash;
  }

  /**
   * Persisted form is the normalized string; the display form is never stored.
   */
  toJSON(): string {
    return this.value;
  }

  /**
   * Display form, e.g. 'NL91 ABNA 0417 1643 00'
   */
  toString(): string {
    return formatIBAN(this.value);
  }
}

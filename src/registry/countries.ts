/**
 * Country Registry
 * Country code to IBAN length mapping, checked and frozen once at module load
 */

import { COUNTRY_DATA } from './country-data.js';

/**
 * A registered IBAN country
 */
export interface CountryEntry {
  /** ISO 3166-1 alpha-2 code, uppercase */
  readonly countryCode: string;
  /** Total IBAN length for this country, 5-34 */
  readonly length: number;
  /** Member of the Single Euro Payments Area scheme */
  readonly sepa: boolean;
}

const COUNTRY_CODE_PATTERN = /^[A-Z]{2}$/;

const MIN_IBAN_LENGTH = 5;
const MAX_IBAN_LENGTH = 34;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds the frozen lookup table from raw country data.
 * Throws on any entry that is not a valid (code, length, sepa) triple.
 */
export function buildCountryTable(raw: unknown): ReadonlyMap<string, CountryEntry> {
  if (!isRecord(raw)) {
    throw new Error('Country table must be an object keyed by country code');
  }

  const table = new Map<string, CountryEntry>();

  for (const [countryCode, value] of Object.entries(raw)) {
    if (!COUNTRY_CODE_PATTERN.test(countryCode)) {
      throw new Error(`Invalid country code '${countryCode}' in country table`);
    }
    if (!isRecord(value)) {
      throw new Error(`Country table entry for ${countryCode} must be an object`);
    }

    const { length, sepa } = value;
    if (
      typeof length !== 'number' ||
      !Number.isInteger(length) ||
      length < MIN_IBAN_LENGTH ||
      length > MAX_IBAN_LENGTH
    ) {
      throw new Error(
        `Country table entry for ${countryCode} has invalid length ${String(length)}`
      );
    }
    if (typeof sepa !== 'boolean') {
      throw new Error(`Country table entry for ${countryCode} has invalid sepa flag`);
    }

    table.set(countryCode, Object.freeze({ countryCode, length, sepa }));
  }

  return table;
}

const COUNTRY_TABLE: ReadonlyMap<string, CountryEntry> = buildCountryTable(COUNTRY_DATA);

const SUPPORTED_COUNTRY_CODES: readonly string[] = Object.freeze(
  Array.from(COUNTRY_TABLE.keys()).sort()
);

/**
 * Looks up a registered country. Only exactly two uppercase ASCII letters can hit.
 */
export function lookupCountry(countryCode: string): CountryEntry | undefined {
  if (!COUNTRY_CODE_PATTERN.test(countryCode)) {
    return undefined;
  }
  return COUNTRY_TABLE.get(countryCode);
}

/**
 * Expected total IBAN length for a country, or undefined on a miss
 */
export function lookupCountryLength(countryCode: string): number | undefined {
  return lookupCountry(countryCode)?.length;
}

/**
 * Expected total IBAN length for a country, or -1 on a miss
 */
export function getLengthForCountryCode(countryCode: string): number {
  return lookupCountryLength(countryCode) ?? -1;
}

export function isKnownCountryCode(countryCode: string): boolean {
  return lookupCountry(countryCode) !== undefined;
}

export function isSEPACountry(countryCode: string): boolean {
  return lookupCountry(countryCode)?.sepa ?? false;
}

/**
 * All registered country codes, sorted
 */
export function getSupportedCountryCodes(): readonly string[] {
  return SUPPORTED_COUNTRY_CODES;
}

/**
 * strict-iban
 * Parsing, validation and an immutable value object for IBANs
 */

export { IBAN } from './iban.js';

export * from './types/index.js';

export {
  lookupCountry,
  lookupCountryLength,
  getLengthForCountryCode,
  isKnownCountryCode,
  isSEPACountry,
  getSupportedCountryCodes,
  type CountryEntry,
} from './registry/countries.js';

export { mod97, isValidChecksum } from './utils/mod97.js';
export { formatIBAN } from './utils/format.js';
export { validateIBANString, IBAN_STRUCTURE_PATTERN } from './pipeline/parser.js';
export { normalizeInput } from './pipeline/normalize.js';

export {
  serializeIBAN,
  deserializeIBAN,
  reviveIBAN,
  SERIALIZATION_VERSION,
} from './persistence/codec.js';

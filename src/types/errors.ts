/**
 * IBAN Error Taxonomy
 * Tagged validation failures plus the error classes thrown for them
 */

/**
 * Error codes for IBAN validation and restoration failures
 */
export enum IBANErrorCode {
  MALFORMED_STRUCTURE = 'MALFORMED_STRUCTURE',
  UNKNOWN_COUNTRY_CODE = 'UNKNOWN_COUNTRY_CODE',
  WRONG_CHECKSUM = 'WRONG_CHECKSUM',
  INTEGRITY_ERROR = 'INTEGRITY_ERROR',
}

/**
 * Why an input was rejected as structurally malformed
 */
export type MalformedReason =
  | 'NULL_INPUT'
  | 'SURROUNDING_WHITESPACE'
  | 'INVALID_STRUCTURE'
  | 'WRONG_LENGTH';

/**
 * Input is absent, contains disallowed characters, or has the wrong shape or length
 */
export interface MalformedStructureFailure {
  readonly code: IBANErrorCode.MALFORMED_STRUCTURE;
  readonly reason: MalformedReason;
  /** Input exactly as given (null when absent) */
  readonly input: string | null;
  /** Set for WRONG_LENGTH only */
  readonly countryCode?: string;
  readonly expectedLength?: number;
  readonly actualLength?: number;
}

/**
 * Well-formed prefix that is not a registered country
 */
export interface UnknownCountryCodeFailure {
  readonly code: IBANErrorCode.UNKNOWN_COUNTRY_CODE;
  readonly input: string;
  readonly countryCode: string;
}

/**
 * Structurally valid but the MOD-97 remainder is not 1
 */
export interface WrongChecksumFailure {
  readonly code: IBANErrorCode.WRONG_CHECKSUM;
  /** Input exactly as submitted, before normalization */
  readonly input: string;
}

export type IBANValidationFailure =
  | MalformedStructureFailure
  | UnknownCountryCodeFailure
  | WrongChecksumFailure;

/**
 * Base error class for the library
 */
export class IBANError extends Error {
  readonly code: IBANErrorCode;

  constructor(message: string, code: IBANErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IBANError';
    this.code = code;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }
}

/**
 * Thrown by IBAN.parse for any rejected input.
 * Subclassed for unknown countries and checksum mismatches.
 */
export class IBANFormatError extends IBANError {
  readonly failure: IBANValidationFailure;

  constructor(message: string, failure: IBANValidationFailure) {
    super(message, failure.code);
    this.name = 'IBANFormatError';
    this.failure = failure;
  }

  /** The rejected input, unmodified */
  get failedInput(): string | null {
    return this.failure.input;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), failure: this.failure };
  }
}

export class UnknownCountryCodeError extends IBANFormatError {
  declare readonly failure: UnknownCountryCodeFailure;
  readonly countryCode: string;

  constructor(failure: UnknownCountryCodeFailure) {
    super(`Unknown country code '${failure.countryCode}' in IBAN '${failure.input}'`, failure);
    this.name = 'UnknownCountryCodeError';
    this.countryCode = failure.countryCode;
  }
}

export class WrongChecksumError extends IBANFormatError {
  declare readonly failure: WrongChecksumFailure;

  constructor(failure: WrongChecksumFailure) {
    super(`Checksum mismatch for IBAN '${failure.input}'`, failure);
    this.name = 'WrongChecksumError';
  }

  override get failedInput(): string {
    return this.failure.input;
  }
}

/**
 * Thrown when a persisted IBAN would not satisfy the value object's invariants
 */
export class IBANIntegrityError extends IBANError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, IBANErrorCode.INTEGRITY_ERROR, options);
    this.name = 'IBANIntegrityError';
  }
}

function describeMalformed(failure: MalformedStructureFailure): string {
  switch (failure.reason) {
    case 'NULL_INPUT':
      return 'IBAN input must not be null';
    case 'SURROUNDING_WHITESPACE':
      return `IBAN '${failure.input ?? ''}' has leading or trailing whitespace`;
    case 'INVALID_STRUCTURE':
      return `Input '${failure.input ?? ''}' does not have the structure of an IBAN`;
    case 'WRONG_LENGTH':
      return (
        `IBAN '${failure.input ?? ''}' has length ${failure.actualLength ?? 0}, ` +
        `expected ${failure.expectedLength ?? 0} for country ${failure.countryCode ?? ''}`
      );
  }
}

/**
 * Maps a validation failure to the error class callers catch
 */
export function toFormatError(failure: IBANValidationFailure): IBANFormatError {
  switch (failure.code) {
    case IBANErrorCode.UNKNOWN_COUNTRY_CODE:
      return new UnknownCountryCodeError(failure);
    case IBANErrorCode.WRONG_CHECKSUM:
      return new WrongChecksumError(failure);
    case IBANErrorCode.MALFORMED_STRUCTURE:
      return new IBANFormatError(describeMalformed(failure), failure);
  }
}

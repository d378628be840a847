import type { IBANValidationFailure } from './errors.js';

export * from './errors.js';

/**
 * Parse options controlling which input forms are accepted
 */
export interface ParseOptions {
  /** Accept the display form: groups of four separated by a single space */
  acceptGrouped: boolean;
  /** Fold lowercase ASCII letters to uppercase before the structural check */
  acceptLowercase: boolean;
}

/**
 * Default parse options: only the normalized form is accepted
 */
export const DEFAULT_PARSE_OPTIONS: Readonly<ParseOptions> = Object.freeze({
  acceptGrouped: false,
  acceptLowercase: false,
});

/**
 * Merges partial parse options with defaults
 */
export function mergeParseOptions(partial: Partial<ParseOptions> = {}): ParseOptions {
  return {
    acceptGrouped: partial.acceptGrouped ?? DEFAULT_PARSE_OPTIONS.acceptGrouped,
    acceptLowercase: partial.acceptLowercase ?? DEFAULT_PARSE_OPTIONS.acceptLowercase,
  };
}

/**
 * Outcome of a non-throwing parse
 */
export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: IBANValidationFailure };

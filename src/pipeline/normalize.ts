/**
 * Input normalization
 * Brings accepted input forms to the compact uppercase form before validation
 */

import type { ParseOptions } from '../types/index.js';

/**
 * Display form: groups of four separated by single spaces, last group 1-4 characters
 */
const GROUPED_PATTERN = /^(?:[A-Za-z0-9]{4} )+[A-Za-z0-9]{1,4}$/;

/**
 * Whether the input starts or ends with whitespace
 */
export function hasSurroundingWhitespace(input: string): boolean {
  return input.length > 0 && input.trim() !== input;
}

/**
 * Normalizes IBAN input according to the accepted forms.
 * Input in any other form is returned unchanged and left for the
 * structural check to reject.
 *
 * @param input - Raw input, already checked for surrounding whitespace
 * @param options - Accepted input forms
 * @returns Normalized candidate
 */
export function normalizeInput(input: string, options: ParseOptions): string {
  let result = input;

  if (options.acceptGrouped && GROUPED_PATTERN.test(result)) {
    result = result.replace(/ /g, '');
  }

  if (options.acceptLowercase) {
    result = result.replace(/[a-z]/g, (char) => char.toUpperCase());
  }

  return result;
}

/**
 * IBAN Checksum Validation (ISO 7064 MOD-97-10)
 */

const CHECKSUM_INPUT_PATTERN = /^[0-9A-Z]{5,}$/;

/**
 * Numeric value of an IBAN character: 0-9 for digits, A=10 ... Z=35.
 * Returns -1 for anything else.
 */
function charToNumber(char: string): number {
  const code = char.charCodeAt(0);
  if (code >= 48 && code <= 57) {
    // 0-9
    return code - 48;
  }
  if (code >= 65 && code <= 90) {
    // A-Z
    return code - 55;
  }
  return -1;
}

/**
 * Calculates the remainder modulo 97 of the decimal number a string of
 * digits and uppercase letters expands to, without building that number.
 * @throws RangeError on a character outside 0-9 and A-Z
 */
export function mod97(input: string): number {
  let remainder = 0;

  for (const char of input) {
    const value = charToNumber(char);
    if (value < 0) {
      throw new RangeError(`Character '${char}' is not valid in a MOD-97 input`);
    }

    // Letters expand to two decimal digits
    remainder = value < 10 ? (remainder * 10 + value) % 97 : (remainder * 100 + value) % 97;
  }

  return remainder;
}

/**
 * Validates the check digits of a normalized IBAN
 * @param normalized - Uppercase, separator-free IBAN
 * @returns true if the remainder of the rearranged IBAN is 1
 */
export function isValidChecksum(normalized: string): boolean {
  if (!CHECKSUM_INPUT_PATTERN.test(normalized)) {
    return false;
  }

  const rearranged = normalized.slice(4) + normalized.slice(0, 4);
  return mod97(rearranged) === 1;
}

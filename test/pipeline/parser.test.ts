import { describe, it, expect } from 'vitest';
import { validateIBANString } from '../../src/pipeline/parser.js';
import { IBANErrorCode } from '../../src/types/index.js';

const VALID_IBAN = 'NL91ABNA0417164300';
const INVALID_IBAN = 'NL12ABNA0417164300';

describe('validateIBANString', () => {
  it('should return the normalized value for a valid IBAN', () => {
    expect(validateIBANString(VALID_IBAN)).toEqual({ ok: true, value: VALID_IBAN });
  });

  describe('null check', () => {
    it('should reject null and undefined as malformed', () => {
      const expected = {
        ok: false,
        failure: { code: IBANErrorCode.MALFORMED_STRUCTURE, reason: 'NULL_INPUT', input: null },
      };

      expect(validateIBANString(null)).toEqual(expected);
      expect(validateIBANString(undefined)).toEqual(expected);
    });
  });

  describe('whitespace', () => {
    it('should reject leading and trailing whitespace without trimming', () => {
      for (const input of [` ${VALID_IBAN}`, `${VALID_IBAN} `, `${VALID_IBAN}\t`, `\n${VALID_IBAN}`]) {
        expect(validateIBANString(input)).toEqual({
          ok: false,
          failure: { code: IBANErrorCode.MALFORMED_STRUCTURE, reason: 'SURROUNDING_WHITESPACE', input },
        });
      }
    });

    it('should reject surrounding whitespace even when grouped input is accepted', () => {
      const result = validateIBANString(' NL91 ABNA 0417 1643 00', { acceptGrouped: true });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.code).toBe(IBANErrorCode.MALFORMED_STRUCTURE);
      }
    });
  });

  describe('structure', () => {
    it.each([
      ['Shenanigans!'],
      [''],
      ['NL91'],
      ['N191ABNA0417164300'],
      ['NLA1ABNA0417164300'],
      ['NL91ABNA-0417164300'],
      ['nl91abna0417164300'],
      ['NL91 ABNA 0417 1643 00'],
      [`NL91${'A'.repeat(31)}`],
    ])('should reject %j as INVALID_STRUCTURE', (input) => {
      expect(validateIBANString(input)).toEqual({
        ok: false,
        failure: { code: IBANErrorCode.MALFORMED_STRUCTURE, reason: 'INVALID_STRUCTURE', input },
      });
    });
  });

  describe('country', () => {
    it('should reject an unknown country code with the original input', () => {
      expect(validateIBANString('UU345678345543234')).toEqual({
        ok: false,
        failure: {
          code: IBANErrorCode.UNKNOWN_COUNTRY_CODE,
          input: 'UU345678345543234',
          countryCode: 'UU',
        },
      });
    });

    it('should check the country before the checksum', () => {
      const result = validateIBANString('XX00A');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.code).toBe(IBANErrorCode.UNKNOWN_COUNTRY_CODE);
      }
    });
  });

  describe('length', () => {
    it('should reject a length that does not match the country', () => {
      expect(validateIBANString('NL91ABNA041716430')).toEqual({
        ok: false,
        failure: {
          code: IBANErrorCode.MALFORMED_STRUCTURE,
          reason: 'WRONG_LENGTH',
          input: 'NL91ABNA041716430',
          countryCode: 'NL',
          expectedLength: 18,
          actualLength: 17,
        },
      });
    });
  });

  describe('checksum', () => {
    it('should reject a checksum mismatch carrying the exact input', () => {
      expect(validateIBANString(INVALID_IBAN)).toEqual({
        ok: false,
        failure: { code: IBANErrorCode.WRONG_CHECKSUM, input: INVALID_IBAN },
      });
    });

    it('should carry the pre-normalization input', () => {
      expect(validateIBANString('NL12 ABNA 0417 1643 00', { acceptGrouped: true })).toEqual({
        ok: false,
        failure: { code: IBANErrorCode.WRONG_CHECKSUM, input: 'NL12 ABNA 0417 1643 00' },
      });
    });
  });

  describe('options', () => {
    it('should accept the grouped display form when enabled', () => {
      expect(validateIBANString('NL91 ABNA 0417 1643 00', { acceptGrouped: true })).toEqual({
        ok: true,
        value: VALID_IBAN,
      });
    });

    it('should still reject irregular grouping', () => {
      for (const input of ['NL91ABNA 0417164300', 'NL91  ABNA 0417 1643 00', 'NL9 1ABN A041 7164 300']) {
        const result = validateIBANString(input, { acceptGrouped: true });
        expect(result.ok).toBe(false);
      }
    });

    it('should fold lowercase when enabled', () => {
      expect(validateIBANString('nl91abna0417164300', { acceptLowercase: true })).toEqual({
        ok: true,
        value: VALID_IBAN,
      });
    });

    it('should combine both options', () => {
      expect(
        validateIBANString('nl91 abna 0417 1643 00', { acceptGrouped: true, acceptLowercase: true })
      ).toEqual({ ok: true, value: VALID_IBAN });
    });
  });
});

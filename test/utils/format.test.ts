import { describe, it, expect } from 'vitest';
import { formatIBAN } from '../../src/utils/format.js';

describe('formatIBAN', () => {
  it('should group by four with single spaces', () => {
    expect(formatIBAN('NL91ABNA0417164300')).toBe('NL91 ABNA 0417 1643 00');
    expect(formatIBAN('DE89370400440532013000')).toBe('DE89 3704 0044 0532 0130 00');
  });

  it('should not leave a trailing space when the length is a multiple of four', () => {
    expect(formatIBAN('BE68539007547034')).toBe('BE68 5390 0754 7034');
  });

  it('should handle the shortest and longest lengths', () => {
    expect(formatIBAN('AB12C')).toBe('AB12 C');
    expect(formatIBAN('LC55HEMM000100010012001200023015')).toBe(
      'LC55 HEMM 0001 0001 0012 0012 0002 3015'
    );
  });
});

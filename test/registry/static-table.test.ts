import { describe, it, expect, vi } from 'vitest';

vi.mock('node:fs', () => ({
  readFileSync: () => {
    throw new Error('no filesystem');
  },
}));

describe('Country table without a filesystem', () => {
  it('should load the library and validate IBANs', async () => {
    const { IBAN, getLengthForCountryCode } = await import('../../src/index.js');

    expect(IBAN.isValid('NL91ABNA0417164300')).toBe(true);
    expect(getLengthForCountryCode('NL')).toBe(18);
  });
});

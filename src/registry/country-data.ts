/**
 * IBAN registry: total length and SEPA membership per country
 */

export interface CountryData {
  readonly length: number;
  readonly sepa: boolean;
}

export const COUNTRY_DATA: Readonly<Record<string, CountryData>> = Object.freeze({
  AD: { length: 24, sepa: true },
  AE: { length: 23, sepa: false },
  AL: { length: 28, sepa: true },
  AT: { length: 20, sepa: true },
  AZ: { length: 28, sepa: false },
  BA: { length: 20, sepa: false },
  BE: { length: 16, sepa: true },
  BG: { length: 22, sepa: true },
  BH: { length: 22, sepa: false },
  BI: { length: 27, sepa: false },
  BR: { length: 29, sepa: false },
  BY: { length: 28, sepa: false },
  CH: { length: 21, sepa: true },
  CR: { length: 22, sepa: false },
  CY: { length: 28, sepa: true },
  CZ: { length: 24, sepa: true },
  DE: { length: 22, sepa: true },
  DJ: { length: 27, sepa: false },
  DK: { length: 18, sepa: true },
  DO: { length: 28, sepa: false },
  EE: { length: 20, sepa: true },
  EG: { length: 29, sepa: false },
  ES: { length: 24, sepa: true },
  FI: { length: 18, sepa: true },
  FK: { length: 18, sepa: false },
  FO: { length: 18, sepa: false },
  FR: { length: 27, sepa: true },
  GB: { length: 22, sepa: true },
  GE: { length: 22, sepa: false },
  GI: { length: 23, sepa: true },
  GL: { length: 18, sepa: false },
  GR: { length: 27, sepa: true },
  GT: { length: 28, sepa: false },
  HN: { length: 28, sepa: false },
  HR: { length: 21, sepa: true },
  HU: { length: 28, sepa: true },
  IE: { length: 22, sepa: true },
  IL: { length: 23, sepa: false },
  IQ: { length: 23, sepa: false },
  IS: { length: 26, sepa: true },
  IT: { length: 27, sepa: true },
  JO: { length: 30, sepa: false },
  KW: { length: 30, sepa: false },
  KZ: { length: 20, sepa: false },
  LB: { length: 28, sepa: false },
  LC: { length: 32, sepa: false },
  LI: { length: 21, sepa: true },
  LT: { length: 20, sepa: true },
  LU: { length: 20, sepa: true },
  LV: { length: 21, sepa: true },
  LY: { length: 25, sepa: false },
  MC: { length: 27, sepa: true },
  MD: { length: 24, sepa: true },
  ME: { length: 22, sepa: true },
  MK: { length: 19, sepa: true },
  MN: { length: 20, sepa: false },
  MR: { length: 27, sepa: false },
  MT: { length: 31, sepa: true },
  MU: { length: 30, sepa: false },
  NI: { length: 28, sepa: false },
  NL: { length: 18, sepa: true },
  NO: { length: 15, sepa: true },
  OM: { length: 23, sepa: false },
  PK: { length: 24, sepa: false },
  PL: { length: 28, sepa: true },
  PS: { length: 29, sepa: false },
  PT: { length: 25, sepa: true },
  QA: { length: 29, sepa: false },
  RO: { length: 24, sepa: true },
  RS: { length: 22, sepa: false },
  RU: { length: 33, sepa: false },
  SA: { length: 24, sepa: false },
  SC: { length: 31, sepa: false },
  SD: { length: 18, sepa: false },
  SE: { length: 24, sepa: true },
  SI: { length: 19, sepa: true },
  SK: { length: 24, sepa: true },
  SM: { length: 27, sepa: true },
  SO: { length: 23, sepa: false },
  ST: { length: 25, sepa: false },
  SV: { length: 28, sepa: false },
  TL: { length: 23, sepa: false },
  TN: { length: 24, sepa: false },
  TR: { length: 26, sepa: false },
  UA: { length: 29, sepa: false },
  VA: { length: 22, sepa: true },
  VG: { length: 24, sepa: false },
  XK: { length: 20, sepa: false },
  YE: { length: 30, sepa: false },
});

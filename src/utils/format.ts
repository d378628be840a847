/**
 * Formats a normalized IBAN with spaces every 4 characters for readability
 */
export function formatIBAN(normalized: string): string {
  return normalized.replace(/(.{4})/g, '$1 ').trim();
}

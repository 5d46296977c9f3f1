/** Canonical county spelling used by CWA payloads: 台 → 臺. */
export function normalizeCityName(input: string): string {
  return input.trim().replace(/台/g, '臺');
}

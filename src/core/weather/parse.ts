import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ component: 'cwaParser' });

const SENTINEL_STRINGS = new Set(['', '-', 'x', 'X', 'N/A', 'NA', '無資料', '/']);
const SENTINEL_NUMBERS = new Set([-99, -98, -990, -999, -9999]);

/**
 * Numeric field from a CWA payload. Missing values and the dataset's
 * sentinel codes map to null, never to 0.
 */
export function parseCwaNumber(value: unknown, field: string): number | null {
  if (value === null || value === undefined) {
    return null;
  }

  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (SENTINEL_STRINGS.has(trimmed)) {
      logger.warn({ field, value }, 'Sentinel value in CWA payload');
      return null;
    }
    parsed = Number(trimmed);
  } else {
    logger.warn({ field, value }, 'Unexpected value type in CWA payload');
    return null;
  }

  if (!Number.isFinite(parsed)) {
    logger.warn({ field, value }, 'Unparseable number in CWA payload');
    return null;
  }
  if (SENTINEL_NUMBERS.has(parsed)) {
    logger.warn({ field, value }, 'Sentinel value in CWA payload');
    return null;
  }
  return parsed;
}

export function parseCwaText(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (SENTINEL_STRINGS.has(trimmed) || SENTINEL_NUMBERS.has(Number(trimmed))) {
    return null;
  }
  return trimmed;
}

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../../utils/errors.js';
import { formatDateLabel, toLocalDateTime } from '../../utils/time.js';

const DEFAULT_TERMS_FILE = new URL('../../../data/solarTerms.json', import.meta.url);

const RAD = Math.PI / 180;
const MS_PER_DAY = 86_400_000;
const TROPICAL_YEAR_DAYS = 365.2422;
/** TT − UT, close enough for day-level results this decade. */
const DELTA_T_SECONDS = 69;
/** Terms from 小寒 (285°) to 驚蟄 (345°) fall before the March equinox. */
const EARLY_YEAR_LONGITUDE = 285;

const solarTermInfoSchema = z.object({
  name: z.string().min(1),
  longitude: z.number().int().min(0).max(345),
  description: z.string(),
  customs: z.string(),
  health: z.string(),
});

const termsFileSchema = z.object({
  terms: z.array(solarTermInfoSchema).length(24),
});

export type SolarTermInfo = z.infer<typeof solarTermInfoSchema>;

export interface SolarTerm extends SolarTermInfo {
  /** Moment the sun reaches the term's longitude. */
  instant: Date;
  /** Local YYYY-MM-DD */
  date: string;
  dateLabel: string;
}

function normalizeDegrees(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

/**
 * Apparent geocentric longitude of the sun in degrees, low-accuracy
 * series (about 0.01°).
 */
export function sunApparentLongitude(instant: Date): number {
  const julianEphemerisDay = instant.getTime() / MS_PER_DAY + 2_440_587.5 + DELTA_T_SECONDS / 86_400;
  const t = (julianEphemerisDay - 2_451_545) / 36_525;

  const meanLongitude = 280.46646 + 36000.76983 * t + 0.0003032 * t * t;
  const meanAnomaly = (357.52911 + 35999.05029 * t - 0.0001537 * t * t) * RAD;
  const center =
    (1.914602 - 0.004817 * t - 0.000014 * t * t) * Math.sin(meanAnomaly) +
    (0.019993 - 0.000101 * t) * Math.sin(2 * meanAnomaly) +
    0.000289 * Math.sin(3 * meanAnomaly);
  const omega = (125.04 - 1934.136 * t) * RAD;

  return normalizeDegrees(meanLongitude + center - 0.00569 - 0.00478 * Math.sin(omega));
}

/** When the sun reaches `longitude` during Gregorian `year`. */
export function solarTermInstant(year: number, longitude: number): Date {
  const baseYear = longitude >= EARLY_YEAR_LONGITUDE ? year - 1 : year;
  let ms = Date.UTC(baseYear, 2, 20) + (longitude / 360) * TROPICAL_YEAR_DAYS * MS_PER_DAY;

  for (let i = 0; i < 20; i++) {
    const remaining = normalizeDegrees(longitude - sunApparentLongitude(new Date(ms)) + 180) - 180;
    ms += (remaining / 360) * TROPICAL_YEAR_DAYS * MS_PER_DAY;
    if (Math.abs(remaining) < 1e-7) break;
  }
  return new Date(Math.round(ms));
}

/** The 24 solar terms with their dates in one timezone. */
export class SolarTermCalendar {
  private readonly byYear = new Map<number, SolarTerm[]>();

  constructor(
    private readonly terms: readonly SolarTermInfo[],
    private readonly timezone: string
  ) {}

  termsForYear(year: number): SolarTerm[] {
    const cached = this.byYear.get(year);
    if (cached) return cached;

    const terms = this.terms
      .map((info) => {
        const instant = solarTermInstant(year, info.longitude);
        const date = toLocalDateTime(instant, this.timezone).date;
        return { ...info, instant, date, dateLabel: formatDateLabel(date) };
      })
      .sort((a, b) => a.instant.getTime() - b.instant.getTime());
    this.byYear.set(year, terms);
    return terms;
  }

  /** The term that starts on `dateKey`, if any. */
  termOn(dateKey: string): SolarTerm | null {
    return this.termsForYear(Number(dateKey.slice(0, 4))).find((term) => term.date === dateKey) ?? null;
  }

  /** The latest term starting on or before `dateKey`. */
  currentTerm(dateKey: string): SolarTerm | null {
    const year = Number(dateKey.slice(0, 4));
    const candidates = [...this.termsForYear(year - 1), ...this.termsForYear(year)];
    let current: SolarTerm | null = null;
    for (const term of candidates) {
      if (term.date > dateKey) break;
      current = term;
    }
    return current;
  }
}

export function loadSolarTermCalendar(timezone: string, file: URL | string = DEFAULT_TERMS_FILE): SolarTermCalendar {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Unable to read solar term table from ${String(file)}`, { cause: error });
  }

  const parsed = termsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid solar term table in ${String(file)}`, { cause: parsed.error });
  }
  return new SolarTermCalendar(parsed.data.terms, timezone);
}

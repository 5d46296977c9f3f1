import { createLogger } from '../../utils/logger.js';
import {
  formatDateLabel,
  isWeekendDate,
  relativeDayLabel,
  splitLocalTimestamp,
  weekdayOf,
} from '../../utils/time.js';
import type { DailyWeatherRecord, OutfitInputs, RawForecastPeriod } from './types.js';
import { toWindScale, uvCategory } from './units.js';

const logger = createLogger({ component: 'DailyAggregator' });

export interface AggregateOptions {
  /** Local date (YYYY-MM-DD) used for the 今天/明天 labels. */
  today?: string;
}

function present<T>(values: Array<T | null>): T[] {
  return values.filter((value): value is T => value !== null);
}

function maxOf(values: Array<number | null>): number | null {
  const numbers = present(values);
  return numbers.length > 0 ? Math.max(...numbers) : null;
}

function minOf(values: Array<number | null>): number | null {
  const numbers = present(values);
  return numbers.length > 0 ? Math.min(...numbers) : null;
}

function meanOf(values: Array<number | null>): number | null {
  const numbers = present(values);
  if (numbers.length === 0) return null;
  return numbers.reduce((sum, value) => sum + value, 0) / numbers.length;
}

/** Most frequent value; ties go to the value seen first. */
export function modeOf(values: Array<string | null>): string | null {
  const counts = new Map<string, number>();
  for (const value of present(values)) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  let best: string | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function clampPercent(value: number | null): number | null {
  if (value === null) return null;
  return Math.min(100, Math.max(0, value));
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : Math.round(value);
}

/** Collapses the periods of one local calendar day into a single record. */
export function aggregateDay(
  locationName: string,
  date: string,
  periods: readonly RawForecastPeriod[],
  options: AggregateOptions = {}
): DailyWeatherRecord {
  let maxTemperature = maxOf(periods.map((p) => p.maxTemperature));
  let minTemperature = minOf(periods.map((p) => p.minTemperature));
  if (maxTemperature !== null && minTemperature !== null && minTemperature > maxTemperature) {
    logger.warn({ locationName, date, minTemperature, maxTemperature }, 'Min temperature above max; swapping');
    [minTemperature, maxTemperature] = [maxTemperature, minTemperature];
  }

  const maxApparentTemperature = maxOf(periods.map((p) => p.maxApparentTemperature));
  const minApparentTemperature = minOf(periods.map((p) => p.minApparentTemperature));
  const humidity = clampPercent(meanOf(periods.map((p) => p.humidity)));
  const precipitationProbability = clampPercent(maxOf(periods.map((p) => p.precipitationProbability)));
  const windSpeed = maxOf(periods.map((p) => p.windSpeed));
  const uvIndex = maxOf(periods.map((p) => p.uvIndex));
  const weather = modeOf(periods.map((p) => p.weather));

  const wind = windSpeed === null ? null : toWindScale(windSpeed);
  const uv = uvIndex === null ? null : uvCategory(uvIndex);

  const outfitInputs: OutfitInputs = Object.freeze({
    apparentTemperature: maxApparentTemperature ?? minApparentTemperature,
    maxTemperature,
    minTemperature,
    humidity,
    precipitationProbability,
    precipitationAmount: null,
    weather,
    windScale: wind?.scale ?? null,
    uvIndex: uv && uv.index >= 0 ? uv.index : null,
  });

  return Object.freeze({
    locationName,
    date,
    dateLabel: formatDateLabel(date),
    dayLabel: relativeDayLabel(date, options.today),
    weekday: weekdayOf(date),
    isWeekend: isWeekendDate(date),
    weather,
    maxTemperature: roundOrNull(maxTemperature),
    minTemperature: roundOrNull(minTemperature),
    maxApparentTemperature: roundOrNull(maxApparentTemperature),
    minApparentTemperature: roundOrNull(minApparentTemperature),
    humidity: roundOrNull(humidity),
    precipitationProbability: roundOrNull(precipitationProbability),
    wind,
    windDirection: modeOf(periods.map((p) => p.windDirection)),
    uv,
    maxComfort: modeOf(periods.map((p) => p.maxComfort)),
    minComfort: modeOf(periods.map((p) => p.minComfort)),
    outfitInputs,
  });
}

/**
 * Groups forecast periods by the local date of their start time and returns
 * one record per date present, in date order.
 */
export function aggregateDailyRecords(
  locationName: string,
  periods: readonly RawForecastPeriod[],
  options: AggregateOptions = {}
): DailyWeatherRecord[] {
  const byDate = new Map<string, RawForecastPeriod[]>();
  for (const period of periods) {
    const local = splitLocalTimestamp(period.startTime);
    if (!local) {
      logger.warn({ locationName, startTime: period.startTime }, 'Skipping period with unreadable start time');
      continue;
    }
    const bucket = byDate.get(local.date);
    if (bucket) {
      bucket.push(period);
    } else {
      byDate.set(local.date, [period]);
    }
  }

  return [...byDate.keys()]
    .sort()
    .map((date) => aggregateDay(locationName, date, byDate.get(date) ?? [], options));
}

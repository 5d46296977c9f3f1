import { createLogger } from '../../../utils/logger.js';
import { parseCwaNumber, parseCwaText } from '../parse.js';
import type { AdapterResult, NotFoundReason, RawForecastPeriod } from '../types.js';

const logger = createLogger({ component: 'cwaResponseAdapter' });

export type NumericPeriodField =
  | 'maxTemperature'
  | 'minTemperature'
  | 'maxApparentTemperature'
  | 'minApparentTemperature'
  | 'humidity'
  | 'precipitationProbability'
  | 'windSpeed'
  | 'uvIndex';

export type TextPeriodField = 'weather' | 'windDirection' | 'maxComfort' | 'minComfort';

/** How one forecast element's value lands on a period. */
export type ElementMapping =
  | { valueKey: string; numeric: readonly NumericPeriodField[] }
  | { valueKey: string; text: readonly TextPeriodField[] };

export function notFound<T>(
  dataset: string,
  reason: NotFoundReason,
  details: Record<string, unknown> = {}
): AdapterResult<T> {
  logger.warn({ dataset, reason, ...details }, 'No usable record in CWA payload');
  return { status: 'not_found', reason };
}

export function emptyPeriod(startTime: string, endTime: string): RawForecastPeriod {
  return {
    startTime,
    endTime,
    weather: null,
    maxTemperature: null,
    minTemperature: null,
    maxApparentTemperature: null,
    minApparentTemperature: null,
    humidity: null,
    precipitationProbability: null,
    windSpeed: null,
    windDirection: null,
    maxComfort: null,
    minComfort: null,
    uvIndex: null,
  };
}

export function applyElementValue(
  period: RawForecastPeriod,
  mapping: ElementMapping,
  value: unknown
): void {
  if ('numeric' in mapping) {
    const parsed = parseCwaNumber(value, mapping.valueKey);
    for (const field of mapping.numeric) {
      period[field] = parsed;
    }
  } else {
    const parsed = parseCwaText(value);
    for (const field of mapping.text) {
      period[field] = parsed;
    }
  }
}

/**
 * Accumulates element values into periods keyed by their start time and
 * returns them in chronological order.
 */
export class PeriodCollector {
  private readonly periods = new Map<string, RawForecastPeriod>();

  at(startTime: string, endTime: string): RawForecastPeriod {
    const existing = this.periods.get(startTime);
    if (existing) {
      if (endTime > existing.endTime) existing.endTime = endTime;
      return existing;
    }
    const period = emptyPeriod(startTime, endTime);
    this.periods.set(startTime, period);
    return period;
  }

  toArray(): RawForecastPeriod[] {
    return [...this.periods.values()].sort((a, b) =>
      a.startTime < b.startTime ? -1 : a.startTime > b.startTime ? 1 : 0
    );
  }
}

import type { WeatherDataPort } from '../../ports/WeatherDataPort.js';
import { createLogger } from '../../utils/logger.js';
import { splitLocalTimestamp, toLocalDateTime } from '../../utils/time.js';
import {
  adviseCurrentOutfit,
  adviseForecastOutfit,
  adviseTodayOutfit,
  observationOutfitInputs,
} from '../outfit/OutfitAdvisor.js';
import {
  adaptCurrentObservation,
  adaptGeneralForecast,
  adaptHourlyForecast,
  adaptUvIndex,
  adaptWeeklyForecast,
} from './adapters/index.js';
import { aggregateDailyRecords, aggregateDay } from './DailyAggregator.js';
import type { StationDirectory } from './StationDirectory.js';
import type {
  DailyWeatherRecord,
  OutfitAdvice,
  OutfitInputs,
  RawForecastPeriod,
  RawObservationRecord,
} from './types.js';
import {
  degreesToCompass,
  toWindScale,
  uvCategory,
  windSpeedToBeaufort,
  type UvCategory,
  type WindScale,
} from './units.js';

export type UnavailableReason = 'unknown_city' | 'upstream_error' | 'no_data';

export type ReportResult<T> = { status: 'ok'; report: T } | { status: 'unavailable'; reason: UnavailableReason };

export interface CurrentWeatherReport {
  city: string;
  observation: RawObservationRecord;
  apparentTemperature: number | null;
  wind: WindScale | null;
  windDirection: string;
  uv: UvCategory;
  advice: OutfitAdvice;
}

export interface TodayWeatherReport {
  city: string;
  summary: DailyWeatherRecord;
  /** Hourly forecast point closest to the request time. */
  nearestHour: RawForecastPeriod | null;
  uv: UvCategory | null;
  outfitInputs: OutfitInputs;
  advice: OutfitAdvice;
}

export interface DailyForecast {
  record: DailyWeatherRecord;
  advice: OutfitAdvice;
}

export interface ForecastReport {
  city: string;
  days: DailyForecast[];
}

export const FORECAST_DAY_OPTIONS = [3, 5, 7] as const;
export type ForecastDays = (typeof FORECAST_DAY_OPTIONS)[number];

export interface WeatherReportProvider {
  getCurrentReport(city: string): Promise<ReportResult<CurrentWeatherReport>>;
  getTodayReport(city: string, now?: Date): Promise<ReportResult<TodayWeatherReport>>;
  getForecastReport(city: string, days: ForecastDays, now?: Date): Promise<ReportResult<ForecastReport>>;
  getWeekendReport(city: string, now?: Date): Promise<ReportResult<ForecastReport>>;
}

function unavailable<T>(reason: UnavailableReason): ReportResult<T> {
  return { status: 'unavailable', reason };
}

function nearestPeriod(periods: readonly RawForecastPeriod[], now: Date): RawForecastPeriod | null {
  let best: RawForecastPeriod | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const period of periods) {
    const at = Date.parse(period.startTime);
    if (Number.isNaN(at)) continue;
    const distance = Math.abs(at - now.getTime());
    if (distance < bestDistance) {
      best = period;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Fetches CWA datasets for a county and runs them through the adapters,
 * the daily aggregator and the outfit advisor.
 */
export class WeatherReportService implements WeatherReportProvider {
  private readonly logger = createLogger({ service: 'WeatherReportService' });

  constructor(
    private readonly weatherData: WeatherDataPort,
    private readonly stations: StationDirectory,
    private readonly timezone: string
  ) {}

  async getCurrentReport(city: string): Promise<ReportResult<CurrentWeatherReport>> {
    const logger = this.logger.child({ method: 'getCurrentReport', city });
    const stations = this.stations.lookup(city);
    if (!stations) return unavailable('unknown_city');

    let payload: unknown;
    try {
      payload = await this.weatherData.fetchCurrentObservation(stations.observationStation);
    } catch (error) {
      logger.error({ error }, 'Failed to fetch current observation');
      return unavailable('upstream_error');
    }

    const adapted = adaptCurrentObservation(payload, stations.observationStation);
    if (adapted.status !== 'found') return unavailable('no_data');

    const observation = adapted.record;
    return {
      status: 'ok',
      report: {
        city,
        observation,
        apparentTemperature: observationOutfitInputs(observation).apparentTemperature,
        wind: observation.windSpeed === null ? null : toWindScale(observation.windSpeed),
        windDirection: degreesToCompass(observation.windDirection),
        uv: uvCategory(observation.uvIndex),
        advice: adviseCurrentOutfit(observation),
      },
    };
  }

  async getTodayReport(city: string, now: Date = new Date()): Promise<ReportResult<TodayWeatherReport>> {
    const logger = this.logger.child({ method: 'getTodayReport', city });
    const stations = this.stations.lookup(city);
    if (!stations) return unavailable('unknown_city');

    const [general, hourly, uvPayload] = await Promise.allSettled([
      this.weatherData.fetchGeneralForecast(city),
      this.weatherData.fetchHourlyForecast(city),
      this.weatherData.fetchUvIndex(),
    ]);

    if (general.status === 'rejected') {
      logger.error({ error: general.reason }, 'Failed to fetch 36-hour forecast');
      return unavailable('upstream_error');
    }
    const generalPeriods = adaptGeneralForecast(general.value, city);
    if (generalPeriods.status !== 'found') return unavailable('no_data');

    const today = toLocalDateTime(now, this.timezone).date;
    const startsToday = generalPeriods.record.filter((p) => splitLocalTimestamp(p.startTime)?.date === today);
    const todayPeriods =
      startsToday.length > 0
        ? startsToday
        : generalPeriods.record.filter((p) => splitLocalTimestamp(p.endTime)?.date === today);
    if (todayPeriods.length === 0) return unavailable('no_data');

    let nearestHour: RawForecastPeriod | null = null;
    if (hourly.status === 'fulfilled') {
      const hourlyPeriods = adaptHourlyForecast(hourly.value, city);
      if (hourlyPeriods.status === 'found') {
        nearestHour = nearestPeriod(hourlyPeriods.record, now);
      }
    } else {
      logger.warn({ error: hourly.reason }, 'Hourly forecast unavailable; using 36-hour values only');
    }

    let uv: UvCategory | null = null;
    if (uvPayload.status === 'fulfilled') {
      const station = adaptUvIndex(uvPayload.value, stations.uvStationId);
      if (station.status === 'found') {
        uv = uvCategory(station.record.uvIndex);
      }
    } else {
      logger.warn({ error: uvPayload.reason }, 'UV index unavailable');
    }

    const summary = aggregateDay(city, today, todayPeriods, { today });
    const base = summary.outfitInputs;
    const hourlyWindSpeed = nearestHour?.windSpeed ?? null;
    const outfitInputs: OutfitInputs = {
      ...base,
      apparentTemperature: nearestHour?.maxApparentTemperature ?? base.apparentTemperature,
      humidity: nearestHour?.humidity ?? base.humidity,
      windScale: hourlyWindSpeed === null ? base.windScale : windSpeedToBeaufort(hourlyWindSpeed),
      uvIndex: uv && uv.index >= 0 ? uv.index : base.uvIndex,
    };

    return {
      status: 'ok',
      report: { city, summary, nearestHour, uv, outfitInputs, advice: adviseTodayOutfit(outfitInputs) },
    };
  }

  async getForecastReport(
    city: string,
    days: ForecastDays,
    now: Date = new Date()
  ): Promise<ReportResult<ForecastReport>> {
    const records = await this.loadUpcomingDays(city, now);
    if (records.status !== 'ok') return records;

    const selected = records.report.slice(0, days);
    if (selected.length === 0) return unavailable('no_data');
    return { status: 'ok', report: { city, days: selected.map(withAdvice) } };
  }

  /** The next Saturday and Sunday within the weekly forecast. */
  async getWeekendReport(city: string, now: Date = new Date()): Promise<ReportResult<ForecastReport>> {
    const records = await this.loadUpcomingDays(city, now);
    if (records.status !== 'ok') return records;

    const weekend = records.report.filter((record) => record.isWeekend).slice(0, 2);
    if (weekend.length === 0) return unavailable('no_data');
    return { status: 'ok', report: { city, days: weekend.map(withAdvice) } };
  }

  private async loadUpcomingDays(city: string, now: Date): Promise<ReportResult<DailyWeatherRecord[]>> {
    const logger = this.logger.child({ method: 'loadUpcomingDays', city });
    if (!this.stations.has(city)) return unavailable('unknown_city');

    let payload: unknown;
    try {
      payload = await this.weatherData.fetchWeeklyForecast(city);
    } catch (error) {
      logger.error({ error }, 'Failed to fetch weekly forecast');
      return unavailable('upstream_error');
    }

    const periods = adaptWeeklyForecast(payload, city);
    if (periods.status !== 'found') return unavailable('no_data');

    const today = toLocalDateTime(now, this.timezone).date;
    const upcoming = aggregateDailyRecords(city, periods.record, { today }).filter((record) => record.date >= today);
    return { status: 'ok', report: upcoming };
  }
}

function withAdvice(record: DailyWeatherRecord): DailyForecast {
  return { record, advice: adviseForecastOutfit(record) };
}

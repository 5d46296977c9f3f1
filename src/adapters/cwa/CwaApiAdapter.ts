import type { Config } from '../../config/index.js';
import { CWA_DATASETS, type CwaDataset, type WeatherDataPort } from '../../ports/WeatherDataPort.js';
import { CwaApiError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const TYPHOON_FETCH_LIMIT = 20;
const TAIPEI_OFFSET_MS = 8 * 60 * 60 * 1000;

/** CWA expects typhoon query times in UTC+8, e.g. `2025-07-26T08:00:00+08:00`. */
export function toTaipeiIsoSeconds(instant: Date): string {
  const shifted = new Date(instant.getTime() + TAIPEI_OFFSET_MS);
  return `${shifted.toISOString().slice(0, 19)}+08:00`;
}

export class CwaApiAdapter implements WeatherDataPort {
  private readonly logger = createLogger({ adapter: 'CwaApiAdapter' });
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config, 'cwaApiKey' | 'cwaBaseUrl' | 'cwaTimeoutMs'>) {
    this.apiKey = config.cwaApiKey;
    this.baseUrl = config.cwaBaseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.cwaTimeoutMs;
  }

  fetchCurrentObservation(stationName: string): Promise<unknown> {
    return this.request(CWA_DATASETS.currentObservation, { StationName: stationName });
  }

  fetchGeneralForecast(locationName: string): Promise<unknown> {
    return this.request(CWA_DATASETS.generalForecast, { locationName });
  }

  fetchHourlyForecast(locationName: string): Promise<unknown> {
    return this.request(CWA_DATASETS.hourlyForecast, { LocationName: locationName });
  }

  fetchWeeklyForecast(locationName: string): Promise<unknown> {
    return this.request(CWA_DATASETS.weeklyForecast, { LocationName: locationName });
  }

  fetchUvIndex(): Promise<unknown> {
    return this.request(CWA_DATASETS.uvIndex, {});
  }

  fetchTyphoon(since: Date): Promise<unknown> {
    return this.request(CWA_DATASETS.typhoon, {
      dataTime: toTaipeiIsoSeconds(since),
      limit: String(TYPHOON_FETCH_LIMIT),
      sort: 'dataTime',
    });
  }

  fetchAreaHazards(): Promise<unknown> {
    return this.request(CWA_DATASETS.areaHazards, {});
  }

  private async request(dataset: CwaDataset, params: Record<string, string>): Promise<unknown> {
    const logger = this.logger.child({ method: 'request', dataset });

    const url = new URL(`${this.baseUrl}/${dataset}`);
    url.searchParams.set('Authorization', this.apiKey);
    url.searchParams.set('format', 'JSON');
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    logger.debug({ params }, 'Fetching CWA dataset');

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      logger.error({ error }, 'CWA request failed');
      throw new CwaApiError(dataset, `CWA request failed for ${dataset}`, { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'CWA API request failed');
      throw new CwaApiError(dataset, `CWA API error: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new CwaApiError(dataset, `CWA returned invalid JSON for ${dataset}`, { cause: error });
    }

    if (typeof body !== 'object' || body === null || !('success' in body) || body.success !== 'true') {
      logger.error('CWA response not marked successful');
      throw new CwaApiError(dataset, `CWA response for ${dataset} was not successful`);
    }

    logger.info('CWA dataset fetched');
    return body;
  }
}

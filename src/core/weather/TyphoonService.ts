import type { WeatherDataPort } from '../../ports/WeatherDataPort.js';
import { createLogger } from '../../utils/logger.js';
import { adaptAreaHazards, adaptTyphoon } from './adapters/index.js';
import type { HazardAlert, TyphoonRecord } from './types.js';
import type { ReportResult } from './WeatherReportService.js';

const LOOKBACK_MS = 48 * 60 * 60 * 1000;

export interface TyphoonReport {
  /** null when no tropical cyclone has been analysed in the lookback window. */
  typhoon: TyphoonRecord | null;
  /** County the hazard list is narrowed to, if any. */
  county: string | null;
  hazards: HazardAlert[];
}

export interface TyphoonProvider {
  getTyphoonReport(county: string | null, now?: Date): Promise<ReportResult<TyphoonReport>>;
}

export class TyphoonService implements TyphoonProvider {
  private readonly logger = createLogger({ service: 'TyphoonService' });

  constructor(private readonly weatherData: WeatherDataPort) {}

  async getTyphoonReport(county: string | null, now: Date = new Date()): Promise<ReportResult<TyphoonReport>> {
    const logger = this.logger.child({ method: 'getTyphoonReport', county });

    const [typhoonPayload, hazardPayload] = await Promise.allSettled([
      this.weatherData.fetchTyphoon(new Date(now.getTime() - LOOKBACK_MS)),
      this.weatherData.fetchAreaHazards(),
    ]);

    if (typhoonPayload.status === 'rejected') {
      logger.error({ error: typhoonPayload.reason }, 'Failed to fetch typhoon track');
      return { status: 'unavailable', reason: 'upstream_error' };
    }

    const adapted = adaptTyphoon(typhoonPayload.value);
    if (adapted.status === 'not_found' && adapted.reason !== 'no_records') {
      return { status: 'unavailable', reason: 'no_data' };
    }

    let hazards: HazardAlert[] = [];
    if (hazardPayload.status === 'fulfilled') {
      const alerts = adaptAreaHazards(hazardPayload.value, county);
      if (alerts.status === 'found') hazards = alerts.record;
    } else {
      logger.warn({ error: hazardPayload.reason }, 'Hazard alerts unavailable');
    }

    const typhoon = adapted.status === 'found' ? adapted.record : null;
    logger.info({ typhoonId: typhoon?.id ?? null, hazards: hazards.length }, 'Typhoon report assembled');
    return { status: 'ok', report: { typhoon, county, hazards } };
  }
}

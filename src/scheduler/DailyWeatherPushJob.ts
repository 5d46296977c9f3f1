import type { WeatherReportProvider } from '../core/weather/WeatherReportService.js';
import type { MessagePort, OutgoingMessage } from '../ports/MessagePort.js';
import type { UserSettingsRepository } from '../persistence/repositories/UserSettingsRepository.js';
import { buildTodayWeatherMessage } from '../presentation/weatherMessages.js';
import { buildTodayOutfitMessage } from '../presentation/outfitMessages.js';
import { createLogger } from '../utils/logger.js';
import { WeatherPushJob } from './WeatherPushJob.js';

export class DailyWeatherPushJob extends WeatherPushJob {
  protected readonly logger = createLogger({ job: 'DailyWeatherPushJob' });
  protected readonly feature = 'daily_weather';

  constructor(
    private readonly reports: WeatherReportProvider,
    messagePort: MessagePort,
    userSettings: UserSettingsRepository
  ) {
    super(messagePort, userSettings);
  }

  protected async buildMessages(city: string, now: Date): Promise<OutgoingMessage[] | null> {
    const result = await this.reports.getTodayReport(city, now);
    if (result.status !== 'ok') return null;
    return [buildTodayWeatherMessage(result.report), buildTodayOutfitMessage(result.report)];
  }
}

import type { WeatherReportProvider } from '../core/weather/WeatherReportService.js';
import type { MessagePort, OutgoingMessage } from '../ports/MessagePort.js';
import type { UserSettingsRepository } from '../persistence/repositories/UserSettingsRepository.js';
import { buildWeekendMessage } from '../presentation/weatherMessages.js';
import { createLogger } from '../utils/logger.js';
import { WeatherPushJob } from './WeatherPushJob.js';

/** Friday evening preview of the coming weekend. */
export class WeekendWeatherPushJob extends WeatherPushJob {
  protected readonly logger = createLogger({ job: 'WeekendWeatherPushJob' });
  protected readonly feature = 'weekend_weather';

  constructor(
    private readonly reports: WeatherReportProvider,
    messagePort: MessagePort,
    userSettings: UserSettingsRepository
  ) {
    super(messagePort, userSettings);
  }

  protected async buildMessages(city: string, now: Date): Promise<OutgoingMessage[] | null> {
    const result = await this.reports.getWeekendReport(city, now);
    if (result.status !== 'ok' || result.report.days.length === 0) return null;
    return [buildWeekendMessage(result.report)];
  }
}

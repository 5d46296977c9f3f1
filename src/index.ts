// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { openDatabase } from './persistence/database.js';
import { UserSettingsRepository } from './persistence/repositories/UserSettingsRepository.js';
import { SystemMetadataRepository } from './persistence/repositories/SystemMetadataRepository.js';
import { loadSolarTermCalendar } from './core/calendar/SolarTermCalendar.js';
import { loadStationDirectory } from './core/weather/StationDirectory.js';
import { WeatherReportService } from './core/weather/WeatherReportService.js';
import { TyphoonService } from './core/weather/TyphoonService.js';
import { WeatherBot } from './core/bot/WeatherBot.js';
import { CwaApiAdapter } from './adapters/cwa/CwaApiAdapter.js';
import { LineAdapter } from './adapters/line/LineAdapter.js';
import { DailyWeatherPushJob } from './scheduler/DailyWeatherPushJob.js';
import { WeekendWeatherPushJob } from './scheduler/WeekendWeatherPushJob.js';
import { TyphoonAlertPushJob } from './scheduler/TyphoonAlertPushJob.js';
import { SolarTermPushJob } from './scheduler/SolarTermPushJob.js';
import { scheduleWeatherPushes } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting CWA weather LINE bot');

  try {
    const config = loadConfig();

    const db = openDatabase(config.databasePath);
    const userSettings = new UserSettingsRepository(db);
    const metadata = new SystemMetadataRepository(db);
    const stations = loadStationDirectory();
    const solarTerms = loadSolarTermCalendar(config.timezone);

    const weatherData = new CwaApiAdapter(config);
    const reports = new WeatherReportService(weatherData, stations, config.timezone);
    const typhoons = new TyphoonService(weatherData);
    const lineAdapter = new LineAdapter(config);

    // Registers its event handler on the LINE adapter
    new WeatherBot({
      messagePort: lineAdapter,
      reports,
      typhoons,
      solarTerms,
      stations,
      userSettings,
      timezone: config.timezone,
    });

    if (config.enableScheduledPush) {
      scheduleWeatherPushes({
        dailyJob: new DailyWeatherPushJob(reports, lineAdapter, userSettings),
        weekendJob: new WeekendWeatherPushJob(reports, lineAdapter, userSettings),
        typhoonJob: new TyphoonAlertPushJob(typhoons, metadata, lineAdapter, userSettings),
        solarTermJob: new SolarTermPushJob(solarTerms, config.timezone, lineAdapter, userSettings),
        dailyPushTime: config.dailyPushTime,
        weekendPushTime: config.weekendPushTime,
        solarTermPushTime: config.solarTermPushTime,
        typhoonCheckIntervalMinutes: config.typhoonCheckIntervalMinutes,
        timezone: config.timezone,
      });
    } else {
      logger.info('Scheduled pushes disabled');
    }

    await startServer(lineAdapter, config.lineChannelSecret, config.port, config.host);
    logger.info({ host: config.host, port: config.port, counties: stations.counties().length }, 'Bot started');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { DailyWeatherPushJob } from '../../scheduler/DailyWeatherPushJob.js';
import { WeekendWeatherPushJob } from '../../scheduler/WeekendWeatherPushJob.js';
import { toCronExpression } from '../../scheduler/index.js';
import type { WeatherReportProvider } from '../../core/weather/WeatherReportService.js';
import type { MessagePort } from '../../ports/MessagePort.js';
import { openDatabase } from '../../persistence/database.js';
import { UserSettingsRepository } from '../../persistence/repositories/UserSettingsRepository.js';
import { ConfigError } from '../../utils/errors.js';
import { forecastReport, todayReport } from '../fixtures/reports.js';

describe('weather push jobs', () => {
  const now = new Date('2025-07-18T00:00:00Z');
  let userSettings: UserSettingsRepository;
  let sendPush: Mock<MessagePort['sendPush']>;
  let messagePort: MessagePort;
  let reports: WeatherReportProvider & {
    getTodayReport: Mock<WeatherReportProvider['getTodayReport']>;
    getWeekendReport: Mock<WeatherReportProvider['getWeekendReport']>;
  };

  function subscribe(userId: string, city: string, feature: 'daily_weather' | 'weekend_weather'): void {
    userSettings.setDefaultCity(userId, city);
    userSettings.setPushEnabled(userId, feature, true);
  }

  beforeEach(() => {
    userSettings = new UserSettingsRepository(openDatabase(':memory:'));
    sendPush = vi.fn<MessagePort['sendPush']>().mockResolvedValue(undefined);
    messagePort = {
      sendPush,
      sendReply: vi.fn<MessagePort['sendReply']>().mockResolvedValue(undefined),
      onEvent: vi.fn<MessagePort['onEvent']>(),
    };
    reports = {
      getCurrentReport: vi.fn<WeatherReportProvider['getCurrentReport']>(),
      getForecastReport: vi.fn<WeatherReportProvider['getForecastReport']>(),
      getTodayReport: vi
        .fn<WeatherReportProvider['getTodayReport']>()
        .mockImplementation(async (city) => ({ status: 'ok', report: todayReport(city) })),
      getWeekendReport: vi
        .fn<WeatherReportProvider['getWeekendReport']>()
        .mockImplementation(async (city) => ({ status: 'ok', report: forecastReport(city) })),
    };
  });

  it('fetches each county once and pushes weather plus outfit advice', async () => {
    subscribe('U1', '臺北市', 'daily_weather');
    subscribe('U2', '臺北市', 'daily_weather');
    subscribe('U3', '花蓮縣', 'daily_weather');
    subscribe('U4', '花蓮縣', 'weekend_weather');

    const summary = await new DailyWeatherPushJob(reports, messagePort, userSettings).run(now);

    expect(summary).toEqual({ cities: 2, sent: 3, failed: 0 });
    expect(reports.getTodayReport).toHaveBeenCalledTimes(2);
    expect(reports.getTodayReport).toHaveBeenCalledWith('臺北市', now);
    const pushed = sendPush.mock.calls.map(([userId, messages]) => [
      userId,
      messages.map((message) => (message.type === 'flex' ? message.altText : message.type)),
    ]);
    expect(pushed).toEqual([
      ['U1', ['臺北市 今日天氣', '臺北市 今日穿搭建議']],
      ['U2', ['臺北市 今日天氣', '臺北市 今日穿搭建議']],
      ['U3', ['花蓮縣 今日天氣', '花蓮縣 今日穿搭建議']],
    ]);
  });

  it('skips counties without data and continues after a failed push', async () => {
    subscribe('U1', '臺北市', 'daily_weather');
    subscribe('U2', '臺北市', 'daily_weather');
    subscribe('U3', '花蓮縣', 'daily_weather');
    reports.getTodayReport.mockImplementation(async (city) =>
      city === '花蓮縣' ? { status: 'unavailable', reason: 'upstream_error' } : { status: 'ok', report: todayReport(city) }
    );
    sendPush.mockRejectedValueOnce(new Error('blocked'));

    const summary = await new DailyWeatherPushJob(reports, messagePort, userSettings).run(now);

    expect(summary).toEqual({ cities: 2, sent: 1, failed: 2 });
    expect(sendPush).toHaveBeenCalledTimes(2);
  });

  it('pushes the weekend preview to weekend subscribers only', async () => {
    subscribe('U1', '臺北市', 'daily_weather');
    subscribe('U2', '臺南市', 'weekend_weather');

    const summary = await new WeekendWeatherPushJob(reports, messagePort, userSettings).run(now);

    expect(summary).toEqual({ cities: 1, sent: 1, failed: 0 });
    expect(sendPush).toHaveBeenCalledWith('U2', [expect.objectContaining({ altText: '臺南市 週末天氣' })]);
  });

  it('does nothing without subscribers', async () => {
    const summary = await new DailyWeatherPushJob(reports, messagePort, userSettings).run(now);

    expect(summary).toEqual({ cities: 0, sent: 0, failed: 0 });
    expect(reports.getTodayReport).not.toHaveBeenCalled();
  });
});

describe('toCronExpression', () => {
  it('converts push times to cron expressions', () => {
    expect(toCronExpression('08:00')).toBe('0 8 * * *');
    expect(toCronExpression('19:30', 5)).toBe('30 19 * * 5');
  });

  it('rejects invalid times', () => {
    expect(() => toCronExpression('24:00')).toThrow(ConfigError);
    expect(() => toCronExpression('8am')).toThrow(ConfigError);
  });
});

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Database } from 'better-sqlite3';
import { TyphoonAlertPushJob, LAST_TYPHOON_KEY } from '../../scheduler/TyphoonAlertPushJob.js';
import { SolarTermPushJob } from '../../scheduler/SolarTermPushJob.js';
import { everyMinutesCron } from '../../scheduler/index.js';
import type { TyphoonProvider } from '../../core/weather/TyphoonService.js';
import { loadSolarTermCalendar } from '../../core/calendar/SolarTermCalendar.js';
import type { MessagePort, OutgoingMessage } from '../../ports/MessagePort.js';
import { openDatabase } from '../../persistence/database.js';
import { UserSettingsRepository } from '../../persistence/repositories/UserSettingsRepository.js';
import { SystemMetadataRepository } from '../../persistence/repositories/SystemMetadataRepository.js';
import { ConfigError } from '../../utils/errors.js';
import { hazardAlert, typhoonRecord } from '../fixtures/reports.js';

function altTexts(messages: OutgoingMessage[]): string[] {
  return messages.map((message) => (message.type === 'flex' ? message.altText : message.type));
}

describe('broadcast push jobs', () => {
  const now = new Date('2025-07-19T06:30:00Z');
  let db: Database;
  let userSettings: UserSettingsRepository;
  let metadata: SystemMetadataRepository;
  let sendPush: Mock<MessagePort['sendPush']>;
  let messagePort: MessagePort;
  let typhoons: { getTyphoonReport: Mock<TyphoonProvider['getTyphoonReport']> };

  beforeEach(() => {
    db = openDatabase(':memory:');
    userSettings = new UserSettingsRepository(db);
    metadata = new SystemMetadataRepository(db);
    sendPush = vi.fn<MessagePort['sendPush']>().mockResolvedValue(undefined);
    messagePort = {
      sendPush,
      sendReply: vi.fn<MessagePort['sendReply']>().mockResolvedValue(undefined),
      onEvent: vi.fn<MessagePort['onEvent']>(),
    };
    typhoons = {
      getTyphoonReport: vi.fn<TyphoonProvider['getTyphoonReport']>().mockResolvedValue({
        status: 'ok',
        report: { typhoon: typhoonRecord(), county: null, hazards: [hazardAlert()] },
      }),
    };
  });

  describe('TyphoonAlertPushJob', () => {
    it('announces a new typhoon to every subscriber once', async () => {
      userSettings.setPushEnabled('U2', 'typhoon_alert', true);
      userSettings.setPushEnabled('U1', 'typhoon_alert', true);
      userSettings.setPushEnabled('U3', 'solar_terms', true);
      const job = new TyphoonAlertPushJob(typhoons, metadata, messagePort, userSettings);

      expect(await job.run(now)).toEqual({ announced: true, sent: 2, failed: 0 });
      expect(typhoons.getTyphoonReport).toHaveBeenCalledWith(null, now);
      expect(sendPush.mock.calls.map(([userId, messages]) => [userId, altTexts(messages)])).toEqual([
        ['U1', ['颱風 薇帕 (WIPHA) 颱風資訊']],
        ['U2', ['颱風 薇帕 (WIPHA) 颱風資訊']],
      ]);
      expect(metadata.get(LAST_TYPHOON_KEY)).toBe('2025_WIPHA');

      expect(await job.run(now)).toEqual({ announced: false, sent: 0, failed: 0 });
      expect(sendPush).toHaveBeenCalledTimes(2);
    });

    it('announces again when a different storm appears', async () => {
      userSettings.setPushEnabled('U1', 'typhoon_alert', true);
      metadata.set(LAST_TYPHOON_KEY, '2025_WIPHA');
      typhoons.getTyphoonReport.mockResolvedValueOnce({
        status: 'ok',
        report: {
          typhoon: typhoonRecord({ id: '2025_PODUL', name: '楊柳', englishName: 'PODUL' }),
          county: null,
          hazards: [],
        },
      });

      const summary = await new TyphoonAlertPushJob(typhoons, metadata, messagePort, userSettings).run(now);

      expect(summary).toEqual({ announced: true, sent: 1, failed: 0 });
      expect(sendPush).toHaveBeenCalledWith('U1', [expect.objectContaining({ altText: '颱風 楊柳 (PODUL) 颱風資訊' })]);
      expect(metadata.get(LAST_TYPHOON_KEY)).toBe('2025_PODUL');
    });

    it('keeps going after a failed push and still records the storm', async () => {
      userSettings.setPushEnabled('U1', 'typhoon_alert', true);
      userSettings.setPushEnabled('U2', 'typhoon_alert', true);
      sendPush.mockRejectedValueOnce(new Error('blocked'));

      const summary = await new TyphoonAlertPushJob(typhoons, metadata, messagePort, userSettings).run(now);

      expect(summary).toEqual({ announced: true, sent: 1, failed: 1 });
      expect(sendPush).toHaveBeenLastCalledWith('U2', expect.any(Array));
      expect(metadata.get(LAST_TYPHOON_KEY)).toBe('2025_WIPHA');
    });

    it('stays quiet when nothing is tracked or the report fails', async () => {
      userSettings.setPushEnabled('U1', 'typhoon_alert', true);
      const job = new TyphoonAlertPushJob(typhoons, metadata, messagePort, userSettings);

      typhoons.getTyphoonReport.mockResolvedValueOnce({
        status: 'ok',
        report: { typhoon: null, county: null, hazards: [] },
      });
      expect(await job.run(now)).toEqual({ announced: false, sent: 0, failed: 0 });

      typhoons.getTyphoonReport.mockResolvedValueOnce({ status: 'unavailable', reason: 'upstream_error' });
      expect(await job.run(now)).toEqual({ announced: false, sent: 0, failed: 0 });

      expect(sendPush).not.toHaveBeenCalled();
      expect(metadata.get(LAST_TYPHOON_KEY)).toBeNull();
    });
  });

  describe('SolarTermPushJob', () => {
    const calendar = loadSolarTermCalendar('Asia/Taipei');

    it('sends the term card on the day it begins', async () => {
      userSettings.setPushEnabled('U1', 'solar_terms', true);
      userSettings.setPushEnabled('U2', 'typhoon_alert', true);

      // 08:00 on 2025-09-23 in Taipei
      const summary = await new SolarTermPushJob(calendar, 'Asia/Taipei', messagePort, userSettings).run(
        new Date('2025-09-23T00:00:00Z')
      );

      expect(summary).toEqual({ announced: true, sent: 1, failed: 0 });
      expect(sendPush).toHaveBeenCalledWith('U1', [expect.objectContaining({ altText: '秋分 節氣小知識' })]);
    });

    it('does nothing on other days', async () => {
      userSettings.setPushEnabled('U1', 'solar_terms', true);

      const summary = await new SolarTermPushJob(calendar, 'Asia/Taipei', messagePort, userSettings).run(
        new Date('2025-09-24T00:00:00Z')
      );

      expect(summary).toEqual({ announced: false, sent: 0, failed: 0 });
      expect(sendPush).not.toHaveBeenCalled();
    });
  });
});

describe('everyMinutesCron', () => {
  it('repeats within the hour', () => {
    expect(everyMinutesCron(30)).toBe('*/30 * * * *');
    expect(everyMinutesCron(1)).toBe('*/1 * * * *');
  });

  it('rejects intervals outside 1-59', () => {
    expect(() => everyMinutesCron(0)).toThrow(ConfigError);
    expect(() => everyMinutesCron(60)).toThrow(ConfigError);
  });
});

import type { PushFeature } from '../core/bot/actions.js';
import type { MessagePort, OutgoingMessage } from '../ports/MessagePort.js';
import type { UserSettingsRepository } from '../persistence/repositories/UserSettingsRepository.js';
import type { Logger } from '../utils/logger.js';

export interface PushRunSummary {
  cities: number;
  sent: number;
  failed: number;
}

/**
 * Sends one weather push per subscriber, fetching each county's report once.
 * A county without data or a failed push is logged and skipped.
 */
export abstract class WeatherPushJob {
  protected abstract readonly logger: Logger;
  protected abstract readonly feature: PushFeature;

  constructor(
    protected readonly messagePort: MessagePort,
    protected readonly userSettings: UserSettingsRepository
  ) {}

  protected abstract buildMessages(city: string, now: Date): Promise<OutgoingMessage[] | null>;

  async run(now: Date = new Date()): Promise<PushRunSummary> {
    const logger = this.logger.child({ method: 'run' });
    const subscribers = this.userSettings.getSubscribersByCity(this.feature);
    const summary: PushRunSummary = { cities: subscribers.size, sent: 0, failed: 0 };

    if (subscribers.size === 0) {
      logger.info('No subscribers; skipping push');
      return summary;
    }

    for (const [city, userIds] of subscribers) {
      const messages = await this.buildMessages(city, now);
      if (!messages) {
        logger.warn({ city, users: userIds.length }, 'No report available; skipping county');
        summary.failed += userIds.length;
        continue;
      }

      for (const userId of userIds) {
        try {
          await this.messagePort.sendPush(userId, messages);
          summary.sent += 1;
        } catch (error) {
          logger.error({ error, userId, city }, 'Failed to push weather');
          summary.failed += 1;
        }
      }
    }

    logger.info(summary, 'Weather push finished');
    return summary;
  }
}

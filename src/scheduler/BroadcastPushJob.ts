import type { PushFeature } from '../core/bot/actions.js';
import type { MessagePort, OutgoingMessage } from '../ports/MessagePort.js';
import type { UserSettingsRepository } from '../persistence/repositories/UserSettingsRepository.js';
import type { Logger } from '../utils/logger.js';

export interface BroadcastRunSummary {
  /** false when there was nothing to announce this run. */
  announced: boolean;
  sent: number;
  failed: number;
}

export interface Broadcast {
  messages: OutgoingMessage[];
  /** Runs once the messages went out, even with no subscribers. */
  commit?: () => void;
}

/** Sends the same messages to every subscriber of a feature. */
export abstract class BroadcastPushJob {
  protected abstract readonly logger: Logger;
  protected abstract readonly feature: PushFeature;

  constructor(
    protected readonly messagePort: MessagePort,
    protected readonly userSettings: UserSettingsRepository
  ) {}

  /** null when there is nothing to send this run. */
  protected abstract prepare(now: Date): Promise<Broadcast | null>;

  async run(now: Date = new Date()): Promise<BroadcastRunSummary> {
    const logger = this.logger.child({ method: 'run' });
    const summary: BroadcastRunSummary = { announced: false, sent: 0, failed: 0 };

    const broadcast = await this.prepare(now);
    if (!broadcast) {
      logger.debug('Nothing to announce');
      return summary;
    }
    summary.announced = true;

    const userIds = this.userSettings.getSubscribers(this.feature);
    for (const userId of userIds) {
      try {
        await this.messagePort.sendPush(userId, broadcast.messages);
        summary.sent += 1;
      } catch (error) {
        logger.error({ error, userId }, 'Failed to push announcement');
        summary.failed += 1;
      }
    }

    broadcast.commit?.();
    logger.info({ ...summary, subscribers: userIds.length }, 'Broadcast push finished');
    return summary;
  }
}

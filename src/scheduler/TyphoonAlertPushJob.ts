import type { TyphoonProvider } from '../core/weather/TyphoonService.js';
import type { MessagePort } from '../ports/MessagePort.js';
import type { SystemMetadataRepository } from '../persistence/repositories/SystemMetadataRepository.js';
import type { UserSettingsRepository } from '../persistence/repositories/UserSettingsRepository.js';
import { buildTyphoonMessage } from '../presentation/typhoonMessages.js';
import { createLogger } from '../utils/logger.js';
import { BroadcastPushJob, type Broadcast } from './BroadcastPushJob.js';

export const LAST_TYPHOON_KEY = 'last_typhoon_id';

/** Announces each tracked typhoon once, the first time a check sees it. */
export class TyphoonAlertPushJob extends BroadcastPushJob {
  protected readonly logger = createLogger({ job: 'TyphoonAlertPushJob' });
  protected readonly feature = 'typhoon_alert';

  constructor(
    private readonly typhoons: TyphoonProvider,
    private readonly metadata: SystemMetadataRepository,
    messagePort: MessagePort,
    userSettings: UserSettingsRepository
  ) {
    super(messagePort, userSettings);
  }

  protected async prepare(now: Date): Promise<Broadcast | null> {
    const result = await this.typhoons.getTyphoonReport(null, now);
    if (result.status !== 'ok') {
      this.logger.warn({ reason: result.reason }, 'Typhoon report unavailable');
      return null;
    }

    const { typhoon, hazards } = result.report;
    if (!typhoon) return null;

    if (this.metadata.get(LAST_TYPHOON_KEY) === typhoon.id) {
      this.logger.debug({ typhoonId: typhoon.id }, 'Typhoon already announced');
      return null;
    }

    this.logger.info({ typhoonId: typhoon.id, name: typhoon.name }, 'New typhoon to announce');
    return {
      messages: [buildTyphoonMessage(typhoon, hazards)],
      commit: () => this.metadata.set(LAST_TYPHOON_KEY, typhoon.id),
    };
  }
}

import type { SolarTermCalendar } from '../core/calendar/SolarTermCalendar.js';
import type { MessagePort } from '../ports/MessagePort.js';
import type { UserSettingsRepository } from '../persistence/repositories/UserSettingsRepository.js';
import { buildSolarTermMessage } from '../presentation/solarTermMessages.js';
import { createLogger } from '../utils/logger.js';
import { toLocalDateTime } from '../utils/time.js';
import { BroadcastPushJob, type Broadcast } from './BroadcastPushJob.js';

/** Runs daily; only sends on the day a solar term begins. */
export class SolarTermPushJob extends BroadcastPushJob {
  protected readonly logger = createLogger({ job: 'SolarTermPushJob' });
  protected readonly feature = 'solar_terms';

  constructor(
    private readonly calendar: SolarTermCalendar,
    private readonly timezone: string,
    messagePort: MessagePort,
    userSettings: UserSettingsRepository
  ) {
    super(messagePort, userSettings);
  }

  protected async prepare(now: Date): Promise<Broadcast | null> {
    const term = this.calendar.termOn(toLocalDateTime(now, this.timezone).date);
    if (!term) return null;

    this.logger.info({ term: term.name }, 'Solar term begins today');
    return { messages: [buildSolarTermMessage(term)] };
  }
}

import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import {
  BOT_ACTIONS,
  OUTFIT_VARIANTS,
  PUSH_FEATURES,
  type ActionRequest,
  type PushFeature,
} from '../../core/bot/actions.js';
import { createLogger } from '../../utils/logger.js';

/** Conversation state: either idle or waiting for a county to finish a request. */
export type UserState = { kind: 'idle' } | { kind: 'awaiting_city'; pending: ActionRequest };

export interface UserSettings {
  userId: string;
  defaultCity: string | null;
  state: UserState;
  push: Record<PushFeature, boolean>;
  updatedAt: number;
}

interface UserSettingsRow {
  user_id: string;
  default_city: string | null;
  state: string;
  state_data: string | null;
  push_daily_weather: number;
  push_weekend_weather: number;
  push_typhoon_alert: number;
  push_solar_terms: number;
  updated_at: number;
}

const pendingRequestSchema = z.object({
  action: z.enum(BOT_ACTIONS),
  city: z.string().optional(),
  days: z.union([z.literal(3), z.literal(5), z.literal(7)]).optional(),
  variant: z.enum(OUTFIT_VARIANTS).optional(),
  feature: z.enum(PUSH_FEATURES).optional(),
  enabled: z.boolean().optional(),
});

const PUSH_COLUMNS: Readonly<Record<PushFeature, string>> = {
  daily_weather: 'push_daily_weather',
  weekend_weather: 'push_weekend_weather',
  typhoon_alert: 'push_typhoon_alert',
  solar_terms: 'push_solar_terms',
};

function pushDefaults(): Record<PushFeature, boolean> {
  return { daily_weather: false, weekend_weather: false, typhoon_alert: false, solar_terms: false };
}

export class UserSettingsRepository {
  private readonly logger = createLogger({ component: 'UserSettingsRepository' });

  constructor(private readonly db: Database) {}

  get(userId: string): UserSettings | null {
    const row = this.db
      .prepare<[string], UserSettingsRow>(
        `SELECT user_id, default_city, state, state_data, push_daily_weather, push_weekend_weather,
                push_typhoon_alert, push_solar_terms, updated_at
         FROM user_settings WHERE user_id = ?`
      )
      .get(userId);

    return row ? this.toSettings(row) : null;
  }

  getOrDefault(userId: string): UserSettings {
    return (
      this.get(userId) ?? {
        userId,
        defaultCity: null,
        state: { kind: 'idle' },
        push: pushDefaults(),
        updatedAt: 0,
      }
    );
  }

  setDefaultCity(userId: string, city: string): void {
    this.db
      .prepare(
        `INSERT INTO user_settings (user_id, default_city) VALUES (?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           default_city = excluded.default_city,
           updated_at = strftime('%s', 'now')`
      )
      .run(userId, city);
  }

  setState(userId: string, state: UserState): void {
    const stateData = state.kind === 'awaiting_city' ? JSON.stringify(state.pending) : null;
    this.db
      .prepare(
        `INSERT INTO user_settings (user_id, state, state_data) VALUES (?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           state = excluded.state,
           state_data = excluded.state_data,
           updated_at = strftime('%s', 'now')`
      )
      .run(userId, state.kind, stateData);
  }

  clearState(userId: string): void {
    this.setState(userId, { kind: 'idle' });
  }

  setPushEnabled(userId: string, feature: PushFeature, enabled: boolean): void {
    const column = PUSH_COLUMNS[feature];
    this.db
      .prepare(
        `INSERT INTO user_settings (user_id, ${column}) VALUES (?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           ${column} = excluded.${column},
           updated_at = strftime('%s', 'now')`
      )
      .run(userId, enabled ? 1 : 0);
  }

  /** Subscribers of a push feature grouped by their default city. */
  getSubscribersByCity(feature: PushFeature): Map<string, string[]> {
    const column = PUSH_COLUMNS[feature];
    const rows = this.db
      .prepare<[], { user_id: string; default_city: string }>(
        `SELECT user_id, default_city FROM user_settings
         WHERE ${column} = 1 AND default_city IS NOT NULL
         ORDER BY default_city, user_id`
      )
      .all();

    const byCity = new Map<string, string[]>();
    for (const row of rows) {
      const users = byCity.get(row.default_city);
      if (users) {
        users.push(row.user_id);
      } else {
        byCity.set(row.default_city, [row.user_id]);
      }
    }
    return byCity;
  }

  /** Every subscriber of a push feature, default city or not. */
  getSubscribers(feature: PushFeature): string[] {
    const column = PUSH_COLUMNS[feature];
    return this.db
      .prepare<[], { user_id: string }>(`SELECT user_id FROM user_settings WHERE ${column} = 1 ORDER BY user_id`)
      .all()
      .map((row) => row.user_id);
  }

  private toSettings(row: UserSettingsRow): UserSettings {
    return {
      userId: row.user_id,
      defaultCity: row.default_city,
      state: this.parseState(row),
      push: {
        daily_weather: row.push_daily_weather === 1,
        weekend_weather: row.push_weekend_weather === 1,
        typhoon_alert: row.push_typhoon_alert === 1,
        solar_terms: row.push_solar_terms === 1,
      },
      updatedAt: row.updated_at,
    };
  }

  private parseState(row: UserSettingsRow): UserState {
    if (row.state !== 'awaiting_city' || row.state_data === null) {
      return { kind: 'idle' };
    }
    try {
      const pending = pendingRequestSchema.safeParse(JSON.parse(row.state_data));
      if (pending.success) {
        return { kind: 'awaiting_city', pending: pending.data };
      }
      this.logger.warn({ userId: row.user_id, issues: pending.error.issues }, 'Discarding invalid stored state');
    } catch (error) {
      this.logger.warn({ userId: row.user_id, error }, 'Discarding unreadable stored state');
    }
    return { kind: 'idle' };
  }
}

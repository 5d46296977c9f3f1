import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { openDatabase, runMigrations } from '../../persistence/database.js';
import { UserSettingsRepository } from '../../persistence/repositories/UserSettingsRepository.js';
import { SystemMetadataRepository } from '../../persistence/repositories/SystemMetadataRepository.js';

describe('UserSettingsRepository', () => {
  let db: Database.Database;
  let repository: UserSettingsRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repository = new UserSettingsRepository(db);
  });

  it('returns defaults for unknown users', () => {
    expect(repository.get('U1')).toBeNull();
    expect(repository.getOrDefault('U1')).toEqual({
      userId: 'U1',
      defaultCity: null,
      state: { kind: 'idle' },
      push: { daily_weather: false, weekend_weather: false, typhoon_alert: false, solar_terms: false },
      updatedAt: 0,
    });
  });

  it('stores the default city', () => {
    repository.setDefaultCity('U1', '臺中市');
    repository.setDefaultCity('U1', '高雄市');

    expect(repository.get('U1')?.defaultCity).toBe('高雄市');
  });

  it('round-trips the pending request while awaiting a county', () => {
    repository.setState('U1', { kind: 'awaiting_city', pending: { action: 'forecast', days: 5 } });

    expect(repository.get('U1')?.state).toEqual({ kind: 'awaiting_city', pending: { action: 'forecast', days: 5 } });

    repository.clearState('U1');
    expect(repository.get('U1')?.state).toEqual({ kind: 'idle' });
  });

  it('falls back to idle when the stored request is invalid', () => {
    db.prepare(
      `INSERT INTO user_settings (user_id, state, state_data) VALUES ('U1', 'awaiting_city', '{"action":"dance"}')`
    ).run();

    expect(repository.get('U1')?.state).toEqual({ kind: 'idle' });
  });

  it('keeps settings independent of each other', () => {
    repository.setDefaultCity('U1', '臺北市');
    repository.setPushEnabled('U1', 'daily_weather', true);
    repository.setState('U1', { kind: 'awaiting_city', pending: { action: 'outfit' } });

    const settings = repository.get('U1');
    expect(settings?.defaultCity).toBe('臺北市');
    expect(settings?.push).toEqual({
      daily_weather: true,
      weekend_weather: false,
      typhoon_alert: false,
      solar_terms: false,
    });
  });

  it('groups push subscribers by default city', () => {
    repository.setDefaultCity('U2', '臺北市');
    repository.setPushEnabled('U2', 'daily_weather', true);
    repository.setDefaultCity('U1', '臺北市');
    repository.setPushEnabled('U1', 'daily_weather', true);
    repository.setDefaultCity('U3', '花蓮縣');
    repository.setPushEnabled('U3', 'daily_weather', true);
    repository.setPushEnabled('U3', 'weekend_weather', true);
    repository.setDefaultCity('U4', '花蓮縣');
    repository.setPushEnabled('U5', 'daily_weather', true);

    expect(repository.getSubscribersByCity('daily_weather')).toEqual(
      new Map([
        ['臺北市', ['U1', 'U2']],
        ['花蓮縣', ['U3']],
      ])
    );
    expect(repository.getSubscribersByCity('weekend_weather')).toEqual(new Map([['花蓮縣', ['U3']]]));

    repository.setPushEnabled('U3', 'weekend_weather', false);
    expect(repository.getSubscribersByCity('weekend_weather').size).toBe(0);
  });

  it('lists broadcast subscribers whether or not they set a city', () => {
    repository.setPushEnabled('U2', 'typhoon_alert', true);
    repository.setDefaultCity('U1', '臺東縣');
    repository.setPushEnabled('U1', 'typhoon_alert', true);
    repository.setPushEnabled('U3', 'solar_terms', true);

    expect(repository.getSubscribers('typhoon_alert')).toEqual(['U1', 'U2']);
    expect(repository.getSubscribers('solar_terms')).toEqual(['U3']);
    expect(repository.getSubscribers('daily_weather')).toEqual([]);
  });

  it('adds the later push columns to an existing table', () => {
    const legacy = new Database(':memory:');
    legacy.exec(`
      CREATE TABLE user_settings (
        user_id TEXT PRIMARY KEY,
        default_city TEXT,
        state TEXT NOT NULL DEFAULT 'idle',
        state_data TEXT,
        push_daily_weather INTEGER NOT NULL DEFAULT 0,
        push_weekend_weather INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER DEFAULT (strftime('%s', 'now')),
        updated_at INTEGER DEFAULT (strftime('%s', 'now'))
      );
      INSERT INTO user_settings (user_id, default_city, push_daily_weather) VALUES ('U1', '臺北市', 1);
    `);

    runMigrations(legacy);
    const migrated = new UserSettingsRepository(legacy);
    migrated.setPushEnabled('U1', 'solar_terms', true);

    expect(migrated.get('U1')?.push).toEqual({
      daily_weather: true,
      weekend_weather: false,
      typhoon_alert: false,
      solar_terms: true,
    });
    legacy.close();
  });
});

describe('SystemMetadataRepository', () => {
  it('stores and overwrites values by key', () => {
    const metadata = new SystemMetadataRepository(openDatabase(':memory:'));

    expect(metadata.get('last_typhoon_id')).toBeNull();
    metadata.set('last_typhoon_id', '2025_WIPHA');
    metadata.set('last_typhoon_id', '2025_PODUL');

    expect(metadata.get('last_typhoon_id')).toBe('2025_PODUL');
  });
});

import type { Database } from 'better-sqlite3';

/** Bot-wide key/value state, such as the last typhoon already announced. */
export class SystemMetadataRepository {
  constructor(private readonly db: Database) {}

  get(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM system_metadata WHERE key = ?')
      .get(key);
    return row?.value ?? null;
  }

  set(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO system_metadata (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET
           value = excluded.value,
           updated_at = strftime('%s', 'now')`
      )
      .run(key, value);
  }
}

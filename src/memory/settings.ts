import type Database from 'better-sqlite3';

/**
 * Small key/value store for preferences that must survive restarts
 * (per-caller pacing overrides).
 */
export class SettingsStore {
  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT DEFAULT (datetime('now'))
      );
    `);
  }

  get(key: string): string | null {
    const row = this.db.prepare('SELECT value FROM settings WHERE key = ?').get(key) as
      | { value?: unknown }
      | undefined;
    return row?.value == null ? null : String(row.value);
  }

  getNumber(key: string): number | null {
    const raw = this.get(key);
    if (raw === null) return null;
    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
  }

  set(key: string, value: string | number): void {
    this.db
      .prepare(
        `
          INSERT INTO settings (key, value, updated_at)
          VALUES (@key, @value, datetime('now'))
          ON CONFLICT(key) DO UPDATE SET
            value = excluded.value,
            updated_at = excluded.updated_at
        `
      )
      .run({ key, value: String(value) });
  }

  delete(key: string): void {
    this.db.prepare('DELETE FROM settings WHERE key = ?').run(key);
  }
}

import type Database from 'better-sqlite3';
import type { ConfigStore, ConfigWriter } from '@lectern/types';
import { nanoid } from 'nanoid';

export class SettingsRepository implements ConfigStore, ConfigWriter {
  constructor(private db: Database.Database) {}

  get(category: string, key: string): string | null {
    const stmt = this.db.prepare<[string, string], { value: string }>(
      'SELECT value FROM settings WHERE category = ? AND key = ?',
    );
    return stmt.get(category, key)?.value ?? null;
  }

  getByCategory(category: string): Record<string, string> {
    const stmt = this.db.prepare<[string], { key: string; value: string }>(
      'SELECT key, value FROM settings WHERE category = ? ORDER BY key',
    );
    return Object.fromEntries(stmt.all(category).map((r) => [r.key, r.value]));
  }

  set(category: string, key: string, value: string): void {
    const stmt = this.db.prepare(`
      INSERT INTO settings (id, category, key, value, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(category, key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);
    stmt.run(nanoid(), category, key, value, new Date().toISOString());
  }

  delete(category: string, key: string): void {
    this.db.prepare('DELETE FROM settings WHERE category = ? AND key = ?').run(category, key);
  }
}

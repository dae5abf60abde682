import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { SettingsPort } from '../../ports/SettingsPort.js';

export class SettingsRepository implements SettingsPort {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  get(key: string): string | undefined {
    const row = this.db.prepare('SELECT value FROM settings WHERE key = ?').get(key) as
      | { value: string | null }
      | undefined;
    // An empty value is treated like a missing one
    return row?.value ? row.value : undefined;
  }
}

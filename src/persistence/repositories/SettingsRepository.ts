import type { Database } from 'better-sqlite3';
import type { Settings } from '../../core/dispatcher/types.js';
import { getDatabase } from '../database.js';
import { languageSchema, unitsSchema } from '../../config/schemas.js';
import { PersistenceError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export class SettingsRepository {
  private readonly logger = createLogger({ repository: 'SettingsRepository' });
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  /** Stored settings, with `defaults` filling any key that is missing or no longer valid. */
  load(defaults: Settings): Settings {
    const rows = this.db.prepare('SELECT key, value FROM settings').all() as Array<{
      key: string;
      value: string;
    }>;
    const stored = new Map(rows.map((row) => [row.key, row.value]));

    const language = languageSchema.safeParse(stored.get('language'));
    const units = unitsSchema.safeParse(stored.get('units'));
    if (stored.size > 0 && (!language.success || !units.success)) {
      this.logger.warn({ stored: Object.fromEntries(stored) }, 'Ignoring invalid stored settings');
    }

    return {
      language: language.success ? language.data : defaults.language,
      units: units.success ? units.data : defaults.units,
    };
  }

  save(settings: Settings): void {
    const upsert = this.db.prepare(
      `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, strftime('%s', 'now'))
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
    );
    const saveAll = this.db.transaction((values: Settings) => {
      upsert.run('language', values.language);
      upsert.run('units', values.units);
    });

    try {
      saveAll(settings);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`Failed to save settings: ${reason}`, { cause: error });
    }
  }
}

import type { Database } from 'better-sqlite3';
import type { Location } from '../../ports/GeocodingPort.js';
import { getDatabase } from '../database.js';
import { PersistenceError } from '../../utils/errors.js';

interface FavouriteRow {
  city: string;
  country: string;
  lat: number;
  lon: number;
}

export class FavouritesRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  /** Stored favourites in list order; empty when nothing has been saved yet. */
  load(): Location[] {
    try {
      const rows = this.db
        .prepare('SELECT city, country, lat, lon FROM favourites ORDER BY position ASC')
        .all() as FavouriteRow[];
      return rows.map((row) => ({
        city: row.city,
        country: row.country,
        coordinates: { lat: row.lat, lon: row.lon },
      }));
    } catch (error) {
      throw new PersistenceError('Failed to load favourites', { cause: error });
    }
  }

  /** Replaces the stored list with `favourites`, all or nothing. */
  save(favourites: readonly Location[]): void {
    const insert = this.db.prepare(
      'INSERT INTO favourites (position, city, country, lat, lon) VALUES (?, ?, ?, ?, ?)'
    );
    const replaceAll = this.db.transaction((entries: readonly Location[]) => {
      this.db.prepare('DELETE FROM favourites').run();
      entries.forEach((entry, position) => {
        insert.run(position, entry.city, entry.country, entry.coordinates.lat, entry.coordinates.lon);
      });
    });

    try {
      replaceAll(favourites);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`Failed to save favourites: ${reason}`, { cause: error });
    }
  }
}

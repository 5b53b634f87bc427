import type { Location } from '../../ports/GeocodingPort.js';
import { DuplicateFavouriteError, FavouriteNotFoundError } from '../../utils/errors.js';

function sameCity(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Ordered favourite locations, unique on city name (case-insensitive).
 * Readers get copies, so a list handed to background work never changes under it.
 */
export class Favourites {
  private entries: Location[];

  constructor(initial: readonly Location[] = []) {
    this.entries = [...initial];
  }

  get size(): number {
    return this.entries.length;
  }

  list(): Location[] {
    return this.entries.map((entry) => ({ ...entry, coordinates: { ...entry.coordinates } }));
  }

  has(city: string): boolean {
    return this.entries.some((entry) => sameCity(entry.city, city));
  }

  add(location: Location): void {
    if (this.has(location.city)) {
      throw new DuplicateFavouriteError(location.city);
    }
    this.entries.push(location);
  }

  remove(city: string): Location {
    const index = this.entries.findIndex((entry) => sameCity(entry.city, city));
    const removed = this.entries[index];
    if (index === -1 || !removed) {
      throw new FavouriteNotFoundError(city);
    }
    this.entries = [...this.entries.slice(0, index), ...this.entries.slice(index + 1)];
    return removed;
  }
}

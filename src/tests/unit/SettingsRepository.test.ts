import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import { openDatabase } from '../../persistence/database.js';
import { SettingsRepository } from '../../persistence/repositories/SettingsRepository.js';
import type { Settings } from '../../core/dispatcher/types.js';

describe('SettingsRepository', () => {
  const defaults: Settings = { language: 'en', units: 'metric' };
  let db: Database;
  let repository: SettingsRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repository = new SettingsRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should fall back to the defaults when nothing is stored', () => {
    expect(repository.load(defaults)).toEqual(defaults);
  });

  it('should round-trip saved settings', () => {
    repository.save({ language: 'de', units: 'imperial' });
    expect(repository.load(defaults)).toEqual({ language: 'de', units: 'imperial' });
  });

  it('should overwrite earlier values', () => {
    repository.save({ language: 'de', units: 'imperial' });
    repository.save({ language: 'fr', units: 'standard' });
    expect(repository.load(defaults)).toEqual({ language: 'fr', units: 'standard' });
  });

  it('should ignore a stored value that is no longer valid', () => {
    db.prepare('INSERT INTO settings (key, value) VALUES (?, ?), (?, ?)').run('language', 'es', 'units', 'kelvin');
    expect(repository.load(defaults)).toEqual({ language: 'es', units: 'metric' });
  });
});

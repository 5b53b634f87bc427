import { describe, it, expect } from 'vitest';
import { formatFavourites, formatHelp, formatTemperature, formatWeather } from '../../core/format/formatters.js';
import { london, paris } from '../fixtures/locations.js';

describe('formatters', () => {
  it('should format a weather report', () => {
    const text = formatWeather(
      { city: 'Paris', country: 'FR', temperature: 17.44, feelsLike: 16, description: 'scattered clouds' },
      'metric'
    );

    expect(text.split('\n')).toEqual([
      'Weather in Paris, FR:',
      'Scattered Clouds',
      'Temperature: 17.4 °C',
      'Feels like: 16.0 °C',
      '--------------------------------------------------------',
    ]);
  });

  it('should omit a missing country', () => {
    const text = formatWeather({ city: 'Open Sea', country: '', temperature: 1, feelsLike: 1, description: 'wind' }, 'metric');
    expect(text.split('\n')[0]).toBe('Weather in Open Sea:');
  });

  it('should use the symbol of the unit system', () => {
    expect(formatTemperature(68, 'imperial')).toBe('68.0 °F');
    expect(formatTemperature(293.2, 'standard')).toBe('293.2 K');
  });

  it('should list favourites between rules', () => {
    expect(formatFavourites([paris, london])).toBe(
      ['------Favourites------', 'Paris, FR', 'London, GB', '----------------------'].join('\n')
    );
  });

  it('should say so when there are no favourites', () => {
    expect(formatFavourites([])).toBe('No favourites added');
  });

  it('should align the command summary', () => {
    const rows = formatHelp().split('\n').slice(1, -1);
    expect(rows).toHaveLength(8);
    const separators = rows.map((row) => row.indexOf('  |  '));
    expect(new Set(separators).size).toBe(1);
    expect(rows[0]).toMatch(/^w <City> \[<Country>\]\s+\|  Get weather by city$/);
  });
});

import type { Location } from '../../ports/GeocodingPort.js';
import type { Units, WeatherResult } from '../../ports/WeatherPort.js';

const SEPARATOR = '--------------------------------------------------------';

const UNIT_SYMBOLS: Record<Units, string> = {
  metric: '°C',
  imperial: '°F',
  standard: 'K',
};

export const NO_FAVOURITES = 'No favourites added';

const COMMANDS: Array<[usage: string, summary: string]> = [
  ['w <City> [<Country>]', 'Get weather by city'],
  ['f', 'Get weather for all of the cities in your favourites'],
  ['list', 'List favourites'],
  ['fav <City> [<Country>]', 'Add city to favourites'],
  ['remove <City>', 'Remove city from favourites'],
  ['lang <code>', 'Set the language of weather descriptions (e.g. en, de, pt_br)'],
  ['units <metric|imperial|standard>', 'Set temperature units'],
  ['help', 'List available commands'],
];

function capitalizeWords(text: string): string {
  return text
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function formatTemperature(value: number, units: Units): string {
  return `${value.toFixed(1)} ${UNIT_SYMBOLS[units]}`;
}

export function formatWeather(weather: WeatherResult, units: Units): string {
  const place = weather.country ? `${weather.city}, ${weather.country}` : weather.city;
  return [
    `Weather in ${place}:`,
    capitalizeWords(weather.description),
    `Temperature: ${formatTemperature(weather.temperature, units)}`,
    `Feels like: ${formatTemperature(weather.feelsLike, units)}`,
    SEPARATOR,
  ].join('\n');
}

export function formatFavourites(favourites: readonly Location[]): string {
  if (favourites.length === 0) {
    return NO_FAVOURITES;
  }
  const lines = favourites.map((location) => `${location.city}, ${location.country}`);
  return ['------Favourites------', ...lines, '----------------------'].join('\n');
}

export function formatHelp(): string {
  const width = Math.max(...COMMANDS.map(([usage]) => usage.length));
  const rows = COMMANDS.map(([usage, summary]) => `${usage.padEnd(width)}  |  ${summary}`);
  return ['-------Commands-------', ...rows, '----------------------'].join('\n');
}

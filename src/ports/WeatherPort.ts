import type { Coordinates } from './GeocodingPort.js';

export const UNITS = ['metric', 'imperial', 'standard'] as const;

export type Units = (typeof UNITS)[number];

export interface WeatherQuery {
  /** OpenWeatherMap language code, e.g. "en" or "pt_br". */
  language: string;
  units: Units;
}

export interface WeatherResult {
  city: string;
  country: string;
  temperature: number;
  feelsLike: number;
  description: string;
}

export interface WeatherPort {
  getCurrentWeather(coordinates: Coordinates, query: WeatherQuery): Promise<WeatherResult>;
}

import type { Command } from '../commands/parseCommand.js';
import type { Location } from '../../ports/GeocodingPort.js';
import type { Units, WeatherResult } from '../../ports/WeatherPort.js';
import type { WeatherCliError } from '../../utils/errors.js';

export interface Settings {
  language: string;
  units: Units;
}

export type FetchTarget =
  | { kind: 'query'; city: string; country?: string }
  | { kind: 'location'; location: Location };

export type FetchIntent = { kind: 'direct' } | { kind: 'favourites'; batchId: number };

export interface FetchRequest {
  readonly id: number;
  readonly target: FetchTarget;
  readonly intent: FetchIntent;
  readonly language: string;
  readonly units: Units;
}

export type FetchOutcome =
  | { status: 'success'; request: FetchRequest; weather: WeatherResult }
  | { status: 'error'; request: FetchRequest; error: WeatherCliError };

export type DispatcherEvent =
  | { kind: 'command'; command: Command }
  | { kind: 'outcome'; outcome: FetchOutcome };

export interface FavouritesBatch {
  total: number;
  remaining: number;
  failed: number;
}

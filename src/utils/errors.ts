export class WeatherCliError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherCliError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends WeatherCliError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class WeatherUnavailableError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('WEATHER', message, options);
    this.name = 'WeatherUnavailableError';
  }
}

export class GeocodingError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('GEOCODING', message, options);
    this.name = 'GeocodingError';
  }
}

export class LocationNotFoundError extends WeatherCliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'LOCATION_NOT_FOUND', options);
    this.name = 'LocationNotFoundError';
  }
}

export class DuplicateFavouriteError extends WeatherCliError {
  constructor(city: string, options?: ErrorOptions) {
    super(`${city} already exists in favourites`, 'DUPLICATE_FAVOURITE', options);
    this.name = 'DuplicateFavouriteError';
  }
}

export class FavouriteNotFoundError extends WeatherCliError {
  constructor(city: string, options?: ErrorOptions) {
    super(`City ${city} does not exist in favourites`, 'FAVOURITE_NOT_FOUND', options);
    this.name = 'FavouriteNotFoundError';
  }
}

export class PersistenceError extends WeatherCliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'PERSISTENCE_ERROR', options);
    this.name = 'PersistenceError';
  }
}

export class InputStreamError extends WeatherCliError {
  readonly exitCode = 1;

  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INPUT_STREAM_FAILURE', options);
    this.name = 'InputStreamError';
  }
}

export class ConfigError extends WeatherCliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

/** Text shown in the terminal for anything a handler or task threw. */
export function toUserMessage(error: unknown): string {
  if (error instanceof WeatherCliError) {
    return error.message;
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
}

/** Short reason for a failed HTTP call, folding fetch's abort-on-timeout into plain words. */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'TimeoutError' ? 'request timed out' : error.message;
  }
  return String(error);
}

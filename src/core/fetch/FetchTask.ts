import type { GeocodingPort, Coordinates } from '../../ports/GeocodingPort.js';
import type { WeatherPort } from '../../ports/WeatherPort.js';
import type { FetchOutcome, FetchRequest, FetchTarget } from '../dispatcher/types.js';
import { WeatherCliError, toUserMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ component: 'FetchTask' });

export interface FetchTaskDependencies {
  geocoding: GeocodingPort;
  weather: WeatherPort;
}

/** Human label for the place a request is about, used in error lines. */
export function describeTarget(target: FetchTarget): string {
  if (target.kind === 'location') {
    return `${target.location.city}, ${target.location.country}`;
  }
  return target.country ? `${target.city}, ${target.country}` : target.city;
}

function toWeatherCliError(error: unknown): WeatherCliError {
  if (error instanceof WeatherCliError) {
    return error;
  }
  return new WeatherCliError(toUserMessage(error), 'UNEXPECTED', { cause: error });
}

async function resolveCoordinates(target: FetchTarget, geocoding: GeocodingPort): Promise<Coordinates> {
  if (target.kind === 'location') {
    return target.location.coordinates;
  }
  const location = await geocoding.resolve(target.city, target.country);
  return location.coordinates;
}

/**
 * Runs one weather lookup and hands its outcome to `deliver` exactly once.
 * Provider failures become an error outcome; they never reject the returned promise.
 */
export async function runFetchTask(
  request: FetchRequest,
  deps: FetchTaskDependencies,
  deliver: (outcome: FetchOutcome) => void
): Promise<void> {
  const taskLogger = logger.child({ requestId: request.id, intent: request.intent.kind });
  taskLogger.debug({ target: describeTarget(request.target) }, 'Fetch task started');

  let outcome: FetchOutcome;
  try {
    const coordinates = await resolveCoordinates(request.target, deps.geocoding);
    const weather = await deps.weather.getCurrentWeather(coordinates, {
      language: request.language,
      units: request.units,
    });
    outcome = { status: 'success', request, weather };
  } catch (error) {
    taskLogger.warn({ error }, 'Fetch task failed');
    outcome = { status: 'error', request, error: toWeatherCliError(error) };
  }

  deliver(outcome);
  taskLogger.debug({ status: outcome.status }, 'Fetch task finished');
}

import { z } from 'zod';
import type { GeocodingPort, Location } from '../../ports/GeocodingPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { GeocodingError, LocationNotFoundError, describeFailure } from '../../utils/errors.js';

const GEO_URL = 'https://api.openweathermap.org/geo/1.0/direct';

const geoResponseSchema = z.array(
  z.object({
    name: z.string(),
    lat: z.number(),
    lon: z.number(),
    country: z.string(),
  })
);

export class OpenWeatherGeocodingAdapter implements GeocodingPort {
  private readonly logger = createLogger({ adapter: 'OpenWeatherGeocodingAdapter' });
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config, 'openWeatherApiKey' | 'requestTimeoutMs'>) {
    this.apiKey = config.openWeatherApiKey;
    this.timeoutMs = config.requestTimeoutMs;
  }

  async resolve(city: string, country?: string): Promise<Location> {
    const logger = this.logger.child({ method: 'resolve', city, country });

    if (!this.apiKey) {
      throw new GeocodingError('OpenWeather API key not configured');
    }

    const query = country ? `${city},${country}` : city;
    const params = new URLSearchParams({ q: query, limit: '1', appid: this.apiKey });

    logger.info('Resolving location');

    let response: Response;
    try {
      response = await fetch(`${GEO_URL}?${params.toString()}`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error({ error }, 'Geocoding request failed');
      throw new GeocodingError(`Failed to fetch location data: ${describeFailure(error)}`, { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'Geocoding API request failed');
      throw new GeocodingError(`Geocoding API error: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      logger.error({ error }, 'Invalid geocoding response body');
      throw new GeocodingError(`Invalid geocoding response: ${describeFailure(error)}`, { cause: error });
    }

    const parsed = geoResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Unexpected geocoding response');
      throw new GeocodingError('Unexpected response from geocoding API', { cause: parsed.error });
    }

    const match = parsed.data[0];
    if (!match) {
      logger.info('No match for location');
      throw new LocationNotFoundError(`Location not found: ${query}`);
    }

    logger.info({ resolved: match.name, country: match.country }, 'Location resolved');

    return {
      city: match.name,
      country: match.country,
      coordinates: { lat: match.lat, lon: match.lon },
    };
  }
}

import { z } from 'zod';
import type { WeatherPort, WeatherQuery, WeatherResult } from '../../ports/WeatherPort.js';
import type { Coordinates } from '../../ports/GeocodingPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { WeatherUnavailableError, describeFailure } from '../../utils/errors.js';

const WEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';

const currentWeatherSchema = z.object({
  name: z.string(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
  }),
  weather: z.array(z.object({ description: z.string() })).min(1),
  sys: z.object({ country: z.string().optional() }).default({}),
});

export class OpenWeatherAdapter implements WeatherPort {
  private readonly logger = createLogger({ adapter: 'OpenWeatherAdapter' });
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config, 'openWeatherApiKey' | 'requestTimeoutMs'>) {
    this.apiKey = config.openWeatherApiKey;
    this.timeoutMs = config.requestTimeoutMs;
    if (!this.apiKey) {
      this.logger.warn('OpenWeather API key not configured; weather will be unavailable');
    }
  }

  async getCurrentWeather(coordinates: Coordinates, query: WeatherQuery): Promise<WeatherResult> {
    const logger = this.logger.child({ method: 'getCurrentWeather', ...coordinates });

    if (!this.apiKey) {
      throw new WeatherUnavailableError('OpenWeather API key not configured');
    }

    const params = new URLSearchParams({
      lat: String(coordinates.lat),
      lon: String(coordinates.lon),
      units: query.units,
      lang: query.language,
      appid: this.apiKey,
    });

    logger.info({ language: query.language, units: query.units }, 'Fetching weather data');

    let response: Response;
    try {
      response = await fetch(`${WEATHER_URL}?${params.toString()}`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error({ error }, 'OpenWeather request failed');
      throw new WeatherUnavailableError(`Failed to fetch weather data: ${describeFailure(error)}`, { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'OpenWeather API request failed');
      throw new WeatherUnavailableError(`OpenWeather API error: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      logger.error({ error }, 'Invalid OpenWeather response body');
      throw new WeatherUnavailableError(`Invalid weather response: ${describeFailure(error)}`, { cause: error });
    }

    const parsed = currentWeatherSchema.safeParse(body);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Unexpected OpenWeather response');
      throw new WeatherUnavailableError('Weather data not found', { cause: parsed.error });
    }

    const data = parsed.data;
    const weather: WeatherResult = {
      city: data.name,
      country: data.sys.country ?? '',
      temperature: data.main.temp,
      feelsLike: data.main.feels_like,
      description: data.weather[0]?.description ?? 'unknown',
    };

    logger.info({ city: weather.city, temperature: weather.temperature }, 'Weather data fetched');

    return weather;
  }
}

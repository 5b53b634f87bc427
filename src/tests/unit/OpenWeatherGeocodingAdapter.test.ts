import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenWeatherGeocodingAdapter } from '../../adapters/geocoding/OpenWeatherGeocodingAdapter.js';
import { GeocodingError, LocationNotFoundError } from '../../utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('OpenWeatherGeocodingAdapter', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const config = { openWeatherApiKey: 'test-api-key', requestTimeoutMs: 5000 };

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should resolve the first match', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse([
        { name: 'Paris', lat: 48.8588897, lon: 2.3200410, country: 'FR', state: 'Ile-de-France' },
      ])
    );

    const adapter = new OpenWeatherGeocodingAdapter(config);
    const location = await adapter.resolve('paris', 'fr');

    expect(location).toEqual({ city: 'Paris', country: 'FR', coordinates: { lat: 48.8588897, lon: 2.320041 } });

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe('https://api.openweathermap.org/geo/1.0/direct');
    expect(url.searchParams.get('q')).toBe('paris,fr');
    expect(url.searchParams.get('limit')).toBe('1');
    expect(url.searchParams.get('appid')).toBe('test-api-key');
  });

  it('should query by city alone when no country is given', async () => {
    fetchMock.mockResolvedValue(jsonResponse([{ name: 'Lima', lat: -12.05, lon: -77.04, country: 'PE' }]));

    const adapter = new OpenWeatherGeocodingAdapter(config);
    await adapter.resolve('lima');

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get('q')).toBe('lima');
  });

  it('should report a location with no match as not found', async () => {
    fetchMock.mockResolvedValue(jsonResponse([]));

    const adapter = new OpenWeatherGeocodingAdapter(config);
    const result = adapter.resolve('atlantis', 'gr');

    await expect(result).rejects.toBeInstanceOf(LocationNotFoundError);
    await expect(result).rejects.toThrow('Location not found: atlantis,gr');
  });

  it('should report HTTP failures as geocoding errors', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ message: 'boom' }, 500));

    const adapter = new OpenWeatherGeocodingAdapter(config);
    const result = adapter.resolve('paris');

    await expect(result).rejects.toBeInstanceOf(GeocodingError);
    await expect(result).rejects.toThrow('Geocoding API error: 500');
  });

  it('should report a body that is not JSON as a geocoding error', async () => {
    fetchMock.mockResolvedValue(new Response('<html>gateway</html>', { status: 200 }));

    const adapter = new OpenWeatherGeocodingAdapter(config);
    const result = adapter.resolve('paris');

    await expect(result).rejects.toBeInstanceOf(GeocodingError);
    await expect(result).rejects.toThrow('Invalid geocoding response');
  });

  it('should report a timeout in plain words', async () => {
    fetchMock.mockRejectedValue(
      Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
    );

    const adapter = new OpenWeatherGeocodingAdapter(config);
    await expect(adapter.resolve('paris')).rejects.toThrow('Failed to fetch location data: request timed out');
  });
});

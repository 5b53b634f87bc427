export interface Coordinates {
  lat: number;
  lon: number;
}

export interface Location {
  city: string;
  country: string;
  coordinates: Coordinates;
}

export interface GeocodingPort {
  /** Resolve a city (optionally narrowed by country code) to its first match. */
  resolve(city: string, country?: string): Promise<Location>;
}

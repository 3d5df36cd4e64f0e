/**
 * Place name → coordinates via OpenStreetMap Nominatim (no API key).
 */
import { z } from 'zod';
import type { WeatherConfig } from '@/config/weather.config';
import type { FetchJson } from '@/services/http/fetch-json';
import { logger } from '@/services/logger';
import type { Coordinates } from './weather-types';

const log = logger.getSubLogger({ name: 'geocoder' });

const searchResponseSchema = z.array(
  z.object({
    lat: z.union([z.string(), z.number()]),
    lon: z.union([z.string(), z.number()]),
  }),
);

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Whole-string decimal parse: "12abc", "0x10", "" and non-finite values yield null. */
export function parseCoordinate(raw: string | number): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export interface Geocoder {
  geocode(place: string): Promise<Coordinates | null>;
}

export class NominatimGeocoder implements Geocoder {
  constructor(
    private readonly config: WeatherConfig,
    private readonly fetchJson: FetchJson,
  ) {}

  searchUrl(place: string): string {
    const url = new URL(`${this.config.geocodingBaseUrl}/search`);
    url.searchParams.set('q', place);
    url.searchParams.set('format', 'json');
    url.searchParams.set('limit', '1');
    return url.toString();
  }

  async geocode(place: string): Promise<Coordinates | null> {
    const result = await this.fetchJson(this.searchUrl(place), {
      headers: { 'User-Agent': this.config.userAgent },
      timeoutMs: this.config.geocodingTimeoutMs,
    });
    if (!result.ok) return null;

    const parsed = searchResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      log.warn('geocode:unexpected_shape', { place });
      return null;
    }
    const first = parsed.data[0];
    if (!first) {
      log.info('geocode:no_results', { place });
      return null;
    }

    const latitude = parseCoordinate(first.lat);
    const longitude = parseCoordinate(first.lon);
    if (latitude === null || longitude === null) {
      log.warn('geocode:invalid_coordinates', { place, lat: first.lat, lon: first.lon });
      return null;
    }
    return { latitude, longitude };
  }
}

/**
 * get_weather pipeline: geocode → NWS grid → forecast → text report.
 * Stages run in order and the first failing stage ends the request with a message.
 * getWeather never throws; every outcome is text.
 */
import type { WeatherConfig } from '@/config/weather.config';
import { fetchJson as defaultFetchJson, type FetchJson } from '@/services/http/fetch-json';
import { logger } from '@/services/logger';
import { NominatimGeocoder, type Geocoder } from '@/services/providers/weather/nominatim-geocoder';
import { GridLookupError, NwsClient, type ForecastClient } from '@/services/providers/weather/nws-client';
import { formatReport, UNKNOWN } from '@/services/providers/weather/report-formatter';
import type { GridResolution } from '@/services/providers/weather/weather-types';

const log = logger.getSubLogger({ name: 'weather-service' });

export const GRID_UNAVAILABLE_MESSAGE =
  'Could not determine weather grid for this location. Please check your city name or try a different city.';
export const NO_PERIODS_MESSAGE = 'No forecast periods available in the API response.';

export interface WeatherServiceDeps {
  geocoder: Geocoder;
  forecastClient: ForecastClient;
}

/** "City, ST" from the points lookup, or the caller's place text when the city is absent. */
export function locationDisplay(place: string, resolution: GridResolution): string {
  const city = resolution.relativeLocation?.city;
  if (!city) return place;
  return `${city}, ${resolution.relativeLocation?.state ?? UNKNOWN}`;
}

export class WeatherService {
  constructor(private readonly deps: WeatherServiceDeps) {}

  async getWeather(place: string): Promise<string> {
    try {
      return await this.run(place);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error('getWeather:unexpected', { place, error: msg });
      return `Unexpected error in get_weather: ${msg}`;
    }
  }

  private async run(place: string): Promise<string> {
    const coordinates = await this.deps.geocoder.geocode(place);
    if (!coordinates) {
      return `Could not find coordinates for city: ${place}`;
    }
    log.debug('getWeather:geocoded', { place, ...coordinates });

    let resolution: GridResolution;
    try {
      resolution = await this.deps.forecastClient.resolveGrid(coordinates);
    } catch (err) {
      if (err instanceof GridLookupError) {
        log.warn('getWeather:grid_lookup_failed', { place, reason: err.message });
        return GRID_UNAVAILABLE_MESSAGE;
      }
      throw err;
    }

    const periods = await this.deps.forecastClient.fetchForecast(resolution.grid);
    if (!periods) {
      return `Failed to retrieve forecast data from URL: ${this.deps.forecastClient.forecastUrl(resolution.grid)}`;
    }
    const current = periods[0];
    if (!current) return NO_PERIODS_MESSAGE;

    return formatReport(locationDisplay(place, resolution), coordinates, current);
  }
}

export function createWeatherService(
  config: WeatherConfig,
  fetchJson: FetchJson = defaultFetchJson,
): WeatherService {
  return new WeatherService({
    geocoder: new NominatimGeocoder(config, fetchJson),
    forecastClient: new NwsClient(config, fetchJson),
  });
}

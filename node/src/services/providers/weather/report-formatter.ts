import type { Coordinates, ForecastPeriod } from './weather-types';

export const UNKNOWN = 'Unknown';
export const NO_DETAILS = 'No detailed forecast available';

/** Reads one known period field, substituting the fallback when it is absent. */
export function readField<K extends keyof ForecastPeriod>(
  period: ForecastPeriod,
  key: K,
  fallback: string,
): string {
  const value = period[key];
  return value === undefined || value === null ? fallback : String(value);
}

export function formatReport(
  locationDisplay: string,
  { latitude, longitude }: Coordinates,
  period: ForecastPeriod,
): string {
  const wind = `${readField(period, 'windSpeed', UNKNOWN)} ${readField(period, 'windDirection', '')}`;
  return [
    `Weather for ${locationDisplay}:`,
    `Coordinates: ${latitude}, ${longitude}`,
    `Forecast: ${readField(period, 'name', UNKNOWN)}`,
    `Temperature: ${readField(period, 'temperature', UNKNOWN)}°${readField(period, 'temperatureUnit', UNKNOWN)}`,
    `Conditions: ${readField(period, 'shortForecast', UNKNOWN)}`,
    `Wind: ${wind.trimEnd()}`,
    `Details: ${readField(period, 'detailedForecast', NO_DETAILS)}`,
  ].join('\n');
}

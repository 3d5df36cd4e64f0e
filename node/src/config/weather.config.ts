/**
 * Weather tool configuration. Read once from the environment, validated, frozen,
 * then passed to each component at construction.
 */
import { z } from 'zod';

const envSchema = z.object({
  NWS_API_BASE: z.string().url().default('https://api.weather.gov'),
  GEOCODING_API_BASE: z.string().url().default('https://nominatim.openstreetmap.org'),
  WEATHER_USER_AGENT: z.string().min(1).default('weather-app/1.0'),
  NWS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GEOCODING_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z.coerce.number().int().min(0).max(6).default(3),
});

export interface WeatherConfig {
  readonly weatherBaseUrl: string;
  readonly geocodingBaseUrl: string;
  readonly userAgent: string;
  readonly weatherTimeoutMs: number;
  readonly geocodingTimeoutMs: number;
  readonly logLevel: number;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/** Throws ZodError when a variable is set to an invalid value. */
export function loadWeatherConfig(env: NodeJS.ProcessEnv = process.env): WeatherConfig {
  const parsed = envSchema.parse(env);
  return Object.freeze({
    weatherBaseUrl: stripTrailingSlash(parsed.NWS_API_BASE),
    geocodingBaseUrl: stripTrailingSlash(parsed.GEOCODING_API_BASE),
    userAgent: parsed.WEATHER_USER_AGENT,
    weatherTimeoutMs: parsed.NWS_TIMEOUT_MS,
    geocodingTimeoutMs: parsed.GEOCODING_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  });
}

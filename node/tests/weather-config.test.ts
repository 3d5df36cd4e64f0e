import { describe, it, expect } from 'vitest';
import { loadWeatherConfig } from '@/config/weather.config';

describe('loadWeatherConfig', () => {
  it('falls back to the public endpoints and default timeouts', () => {
    expect(loadWeatherConfig({})).toEqual({
      weatherBaseUrl: 'https://api.weather.gov',
      geocodingBaseUrl: 'https://nominatim.openstreetmap.org',
      userAgent: 'weather-app/1.0',
      weatherTimeoutMs: 30_000,
      geocodingTimeoutMs: 10_000,
      logLevel: 3,
    });
  });

  it('reads overrides and strips trailing slashes from base urls', () => {
    const config = loadWeatherConfig({
      NWS_API_BASE: 'http://localhost:8080/',
      WEATHER_USER_AGENT: 'test-agent/0.1',
      NWS_TIMEOUT_MS: '500',
    });
    expect(config.weatherBaseUrl).toBe('http://localhost:8080');
    expect(config.userAgent).toBe('test-agent/0.1');
    expect(config.weatherTimeoutMs).toBe(500);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => loadWeatherConfig({ GEOCODING_TIMEOUT_MS: 'soon' })).toThrow();
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadWeatherConfig({}))).toBe(true);
  });
});

/**
 * National Weather Service API: points lookup (coordinates → grid) and gridpoint forecast.
 */
import { z } from 'zod';
import type { WeatherConfig } from '@/config/weather.config';
import type { FetchJson, JsonRequestOptions } from '@/services/http/fetch-json';
import { logger } from '@/services/logger';
import type {
  Coordinates,
  ForecastPeriod,
  GridReference,
  GridResolution,
  RelativeLocation,
} from './weather-types';

const log = logger.getSubLogger({ name: 'nws' });

/** Thrown when the points lookup fails or lacks any of gridId / gridX / gridY. */
export class GridLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridLookupError';
  }
}

const relativeLocationSchema = z.object({
  properties: z.object({
    city: z.string().optional().catch(undefined),
    state: z.string().optional().catch(undefined),
  }),
});

// Zero counts as missing, like an absent field.
const gridOffsetSchema = z.number().int().refine((value) => value !== 0);

const pointsResponseSchema = z.object({
  properties: z.object({
    gridId: z.string().min(1),
    gridX: gridOffsetSchema,
    gridY: gridOffsetSchema,
    relativeLocation: relativeLocationSchema.nullish().catch(null),
  }),
});

// Field-level catch: a wrongly typed field reads as absent instead of dropping the period.
const periodSchema = z.object({
  name: z.string().optional().catch(undefined),
  temperature: z.number().optional().catch(undefined),
  temperatureUnit: z.string().optional().catch(undefined),
  shortForecast: z.string().optional().catch(undefined),
  detailedForecast: z.string().optional().catch(undefined),
  windSpeed: z.string().optional().catch(undefined),
  windDirection: z.string().optional().catch(undefined),
});

const forecastResponseSchema = z.object({
  properties: z.object({
    periods: z.array(z.unknown()),
  }),
});

function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length > 0;
}

/** Round to 4 decimals and print without trailing zeros, e.g. 37.77493 → "37.7749". */
export function formatPointCoordinate(value: number): string {
  return String(Number(value.toFixed(4)));
}

function toPeriod(raw: unknown): ForecastPeriod {
  const parsed = periodSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

export interface ForecastClient {
  resolveGrid(coordinates: Coordinates): Promise<GridResolution>;
  forecastUrl(grid: GridReference): string;
  fetchForecast(grid: GridReference): Promise<ForecastPeriod[] | null>;
}

export class NwsClient implements ForecastClient {
  constructor(
    private readonly config: WeatherConfig,
    private readonly fetchJson: FetchJson,
  ) {}

  private requestOptions(): JsonRequestOptions {
    return {
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: 'application/geo+json',
      },
      timeoutMs: this.config.weatherTimeoutMs,
    };
  }

  pointsUrl({ latitude, longitude }: Coordinates): string {
    return `${this.config.weatherBaseUrl}/points/${formatPointCoordinate(latitude)},${formatPointCoordinate(longitude)}`;
  }

  forecastUrl({ gridId, gridX, gridY }: GridReference): string {
    return `${this.config.weatherBaseUrl}/gridpoints/${gridId}/${gridX},${gridY}/forecast`;
  }

  async resolveGrid(coordinates: Coordinates): Promise<GridResolution> {
    const pointsUrl = this.pointsUrl(coordinates);
    const result = await this.fetchJson(pointsUrl, this.requestOptions());
    if (!result.ok) {
      throw new GridLookupError('Failed to retrieve points data');
    }

    const parsed = pointsResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      log.warn('resolveGrid:grid_missing', { pointsUrl });
      throw new GridLookupError('Grid information is missing');
    }

    const { gridId, gridX, gridY, relativeLocation } = parsed.data.properties;
    let location: RelativeLocation | null = null;
    if (relativeLocation) {
      const { city, state } = relativeLocation.properties;
      location = {
        ...(city !== undefined && { city }),
        ...(state !== undefined && { state }),
      };
    }
    log.debug('resolveGrid:resolved', { pointsUrl, gridId, gridX, gridY });
    return { grid: { gridId, gridX, gridY }, relativeLocation: location, pointsUrl };
  }

  /** Null when the forecast endpoint fails or answers with an empty body; [] when the body carries no periods. */
  async fetchForecast(grid: GridReference): Promise<ForecastPeriod[] | null> {
    const url = this.forecastUrl(grid);
    const result = await this.fetchJson(url, this.requestOptions());
    if (!result.ok) return null;
    if (!isNonEmptyObject(result.data)) {
      log.warn('fetchForecast:empty_body', { url });
      return null;
    }

    const parsed = forecastResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      log.warn('fetchForecast:no_periods', { url });
      return [];
    }
    return parsed.data.properties.periods.map(toPeriod);
  }
}

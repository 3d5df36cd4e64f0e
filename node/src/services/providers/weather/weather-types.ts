/** Per-request values passed between the weather pipeline stages. */

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** NWS forecast office code plus the X/Y offset of the grid cell. */
export interface GridReference {
  gridId: string;
  gridX: number;
  gridY: number;
}

export interface RelativeLocation {
  city?: string;
  state?: string;
}

export interface GridResolution {
  grid: GridReference;
  /** From the same points response; null when absent or malformed. */
  relativeLocation: RelativeLocation | null;
  pointsUrl: string;
}

export interface ForecastPeriod {
  name?: string;
  temperature?: number;
  temperatureUnit?: string;
  shortForecast?: string;
  detailedForecast?: string;
  windSpeed?: string;
  windDirection?: string;
}

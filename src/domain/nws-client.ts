/**
 * Weather service client
 *
 * Forecasts take two requests: the points endpoint maps coordinates to the
 * forecast URL of a grid cell, and that URL returns the ordered periods.
 */

import { z } from 'zod';
import { HttpClient } from './http-client.js';
import { MalformedResponseError } from './errors.js';
import { logger } from './logger.js';
import { getRunId } from './request-context.js';
import {
  PointsResponseSchema,
  ForecastResponseSchema,
  describeIssues,
  type RawForecastPeriod,
} from './schemas/nws.js';
import type { ForecastPeriod, ForecastRequestSpec } from './types.js';

export interface NwsClientConfig {
  /** Base URL of the weather service (e.g., https://api.weather.gov) */
  baseUrl: string;
}

/**
 * Format a coordinate the way the points endpoint expects it
 */
export function formatCoordinate(value: number): string {
  return value.toFixed(4);
}

/**
 * Validate a body against a schema or fail with MalformedResponseError
 */
function parseBody<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string,
  url: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedResponseError(
      `Unexpected ${what} from the weather service: ${describeIssues(result.error)}`,
      { upstreamUrl: url, runId: getRunId() }
    );
  }
  return result.data;
}

function toForecastPeriod(period: RawForecastPeriod): ForecastPeriod {
  return {
    number: period.number,
    name: period.name,
    temperature: period.temperature,
    temperatureUnit: period.temperatureUnit,
    precipitationProbability: period.probabilityOfPrecipitation?.value ?? null,
    windSpeed: period.windSpeed,
    windDirection: period.windDirection,
    shortForecast: period.shortForecast,
  };
}

export class NwsClient {
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpClient,
    config: NwsClientConfig
  ) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  /**
   * Build the points URL for a coordinate pair
   */
  pointsUrl(lat: number, lon: number): string {
    return `${this.baseUrl}/points/${formatCoordinate(lat)},${formatCoordinate(lon)}`;
  }

  /**
   * Step A: resolve coordinates to the grid cell's forecast endpoint
   */
  async fetchPoints(lat: number, lon: number): Promise<ForecastRequestSpec> {
    const url = this.pointsUrl(lat, lon);
    const response = await this.http.getJson(url);
    const points = parseBody(PointsResponseSchema, response.data, 'points data', url);
    const { forecast, gridId, gridX, gridY, relativeLocation } = points.properties;

    logger.debug('Resolved forecast endpoint', {
      runId: getRunId(),
      forecastUrl: forecast,
      gridId,
    });

    return {
      forecastUrl: forecast,
      gridId,
      gridX,
      gridY,
      relativeLocation: relativeLocation?.properties,
    };
  }

  /**
   * Step B: fetch the ordered forecast periods for a grid cell
   *
   * @throws MalformedResponseError when the body has no periods
   */
  async fetchForecast(spec: ForecastRequestSpec): Promise<ForecastPeriod[]> {
    const url = spec.forecastUrl;
    const response = await this.http.getJson(url);
    const forecast = parseBody(ForecastResponseSchema, response.data, 'forecast data', url);
    const periods = forecast.properties.periods;

    if (periods.length === 0) {
      throw new MalformedResponseError(
        'The weather service returned no forecast periods.',
        { upstreamUrl: url, runId: getRunId() }
      );
    }

    return periods.map(toForecastPeriod);
  }

  /**
   * First `count` periods in upstream order
   */
  async getForecastPeriods(
    lat: number,
    lon: number,
    count: number
  ): Promise<ForecastPeriod[]> {
    const spec = await this.fetchPoints(lat, lon);
    const periods = await this.fetchForecast(spec);
    return periods.slice(0, Math.max(1, count));
  }

  /**
   * The current period: always the first one the service lists, with no
   * filtering on the current time
   */
  async getForecast(lat: number, lon: number): Promise<ForecastPeriod> {
    const [first] = await this.getForecastPeriods(lat, lon, 1);
    return first;
  }
}

/**
 * Shared fixtures for tests: canned weather service bodies, an in-process
 * transport that serves them, and an in-memory postal dataset
 */

import { vi, type Mock } from 'vitest';
import type { FetchLike } from '../domain/http-client.js';
import type { PostalDataset, PostalRecord } from '../postal/types.js';

export const BASE_URL = 'https://api.weather.gov';
export const POINTS_URL = `${BASE_URL}/points/34.0901,-118.4065`;
export const FORECAST_URL = `${BASE_URL}/gridpoints/LOX/149,48/forecast`;

export const BEVERLY_HILLS: PostalRecord = {
  postalCode: '90210',
  placeName: 'Beverly Hills',
  stateCode: 'CA',
  latitude: 34.0901,
  longitude: -118.4065,
};

export function pointsBody(forecastUrl: string = FORECAST_URL): unknown {
  return {
    '@context': ['https://geojson.org/geojson-ld/geojson-context.jsonld'],
    type: 'Feature',
    properties: {
      gridId: 'LOX',
      gridX: 149,
      gridY: 48,
      forecast: forecastUrl,
      forecastHourly: `${forecastUrl}/hourly`,
      relativeLocation: {
        type: 'Feature',
        properties: { city: 'Beverly Hills', state: 'CA' },
      },
    },
  };
}

export const RAW_PERIODS = [
  {
    number: 1,
    name: 'Tonight',
    startTime: '2026-10-18T18:00:00-07:00',
    endTime: '2026-10-19T06:00:00-07:00',
    isDaytime: false,
    temperature: 58,
    temperatureUnit: 'F',
    temperatureTrend: null,
    probabilityOfPrecipitation: { unitCode: 'wmoUnit:percent', value: 20 },
    windSpeed: '5 mph',
    windDirection: 'SW',
    shortForecast: 'Mostly Clear',
    detailedForecast: 'Mostly clear, with a low around 58.',
  },
  {
    number: 2,
    name: 'Sunday',
    startTime: '2026-10-19T06:00:00-07:00',
    endTime: '2026-10-19T18:00:00-07:00',
    isDaytime: true,
    temperature: 75,
    temperatureUnit: 'F',
    temperatureTrend: null,
    probabilityOfPrecipitation: { unitCode: 'wmoUnit:percent', value: null },
    windSpeed: '5 to 10 mph',
    windDirection: 'W',
    shortForecast: 'Sunny',
    detailedForecast: 'Sunny, with a high near 75.',
  },
  {
    number: 3,
    name: 'Sunday Night',
    startTime: '2026-10-19T18:00:00-07:00',
    endTime: '2026-10-20T06:00:00-07:00',
    isDaytime: false,
    temperature: 57,
    temperatureUnit: 'F',
    temperatureTrend: null,
    probabilityOfPrecipitation: { unitCode: 'wmoUnit:percent', value: 10 },
    windSpeed: '5 mph',
    windDirection: 'WSW',
    shortForecast: 'Partly Cloudy',
    detailedForecast: 'Partly cloudy, with a low around 57.',
  },
];

export function forecastBody(periods: unknown[] = RAW_PERIODS): unknown {
  return {
    type: 'Feature',
    properties: {
      units: 'us',
      generatedAt: '2026-10-18T20:15:00+00:00',
      periods,
    },
  };
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/geo+json' },
    ...init,
  });
}

/**
 * Transport serving a fixed body per URL; anything else is a 404
 */
export function routeFetch(routes: Record<string, () => Response>): Mock<FetchLike> {
  return vi.fn<FetchLike>(async (url) => {
    const route = routes[url];
    if (!route) {
      return jsonResponse({ title: 'Not Found' }, { status: 404, statusText: 'Not Found' });
    }
    return route();
  });
}

/**
 * The happy path: points and forecast both answer
 */
export function healthyFetch(): Mock<FetchLike> {
  return routeFetch({
    [POINTS_URL]: () => jsonResponse(pointsBody()),
    [FORECAST_URL]: () => jsonResponse(forecastBody()),
  });
}

/**
 * Postal dataset backed by a plain map
 */
export class MemoryDataset implements PostalDataset {
  readonly name = 'memory';
  closed = false;
  private readonly records: Map<string, PostalRecord>;

  constructor(records: PostalRecord[] = [BEVERLY_HILLS]) {
    this.records = new Map(records.map((r) => [r.postalCode, r]));
  }

  lookup(postalCode: string): PostalRecord | undefined {
    return this.records.get(postalCode);
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Common types for zipcast
 */

/**
 * Standard error codes for forecast failures
 */
export type ErrorCode =
  | 'INVALID_LOCATION'
  | 'NETWORK_ERROR'
  | 'UPSTREAM_HTTP_ERROR'
  | 'MALFORMED_RESPONSE';

/**
 * Extra detail attached to a forecast error
 */
export interface ErrorDetails {
  upstreamStatus?: number;
  upstreamUrl?: string;
  runId?: string;
  retryAfterSeconds?: number;
  [key: string]: unknown;
}

/**
 * A resolved postal code
 */
export interface GeoLocation {
  postalCode: string;
  latitude: number;
  longitude: number;
  placeName: string;
  stateCode: string;
}

export type NotFoundReason = 'empty_input' | 'unknown_code' | 'missing_coordinates';

/**
 * Outcome of a geocoder lookup
 */
export type LookupResult =
  | { kind: 'found'; location: GeoLocation }
  | { kind: 'not_found'; postalCode: string; reason: NotFoundReason };

/**
 * What the points lookup yields for the forecast lookup
 */
export interface ForecastRequestSpec {
  forecastUrl: string;
  gridId?: string;
  gridX?: number;
  gridY?: number;
  /** Nearest named place the weather service associates with the point */
  relativeLocation?: { city: string; state: string };
}

/**
 * One block of forecast as returned by the weather service
 */
export interface ForecastPeriod {
  number: number;
  name: string;
  temperature: number;
  temperatureUnit: string;
  /** Percent; null when the service gives no value */
  precipitationProbability: number | null;
  windSpeed: string;
  windDirection: string;
  shortForecast: string;
}

/**
 * License and attribution information
 */
export interface Attribution {
  licenseUri: string;
  creditLine: string;
}

/**
 * Source metadata included in every report
 */
export interface SourceMetadata {
  provider: string;
  product: string;
  licenseUri: string;
  creditLine: string;
}

/**
 * Result of one successful pipeline run
 */
export interface ForecastReport {
  location: GeoLocation;
  periods: ForecastPeriod[];
  source: SourceMetadata;
}

export type PipelineState =
  | 'AWAITING_INPUT'
  | 'RESOLVING_LOCATION'
  | 'FETCHING_FORECAST'
  | 'DONE'
  | 'FAILED';

/**
 * Response from the HTTP client
 */
export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Headers;
}

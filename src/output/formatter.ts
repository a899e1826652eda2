/**
 * Rendering of forecast reports for the terminal and for machines
 */

import { formatPlaceName } from '../postal/geocoder.js';
import type { ForecastPeriod, ForecastReport, GeoLocation, SourceMetadata } from '../domain/types.js';

/**
 * Precipitation chance as printed; a missing value counts as 0%
 */
export function formatPrecipitation(probability: number | null): string {
  return `${probability ?? 0}%`;
}

export function formatPeriod(period: ForecastPeriod): string {
  return [
    `>> ${period.name}:`,
    `   Temperature: ${period.temperature}°${period.temperatureUnit}`,
    `   Chance of Precipitation: ${formatPrecipitation(period.precipitationProbability)}`,
    `   Wind: ${period.windSpeed} ${period.windDirection}`,
    `   Forecast: ${period.shortForecast}`,
  ].join('\n');
}

/**
 * Plain-text summary of a report
 */
export function formatReport(report: ForecastReport): string {
  const { location } = report;
  const header = `Weather forecast for ${formatPlaceName(location)} (${location.postalCode})`;
  const body = report.periods.map(formatPeriod).join('\n\n');
  return `${header}\n\n${body}\n`;
}

export interface JsonPeriod {
  name: string;
  temperature: number;
  temperatureUnit: string;
  windSpeed: string;
  windDirection: string;
  shortForecast: string;
  chanceOfPrecipitation: string;
}

/**
 * Machine-readable output
 */
export interface JsonReport {
  locationName: string | null;
  latitude: number | null;
  longitude: number | null;
  errorMessage: string | null;
  forecastPeriods: JsonPeriod[];
  source?: SourceMetadata;
}

function toJsonPeriod(period: ForecastPeriod): JsonPeriod {
  return {
    name: period.name,
    temperature: period.temperature,
    temperatureUnit: period.temperatureUnit,
    windSpeed: period.windSpeed,
    windDirection: period.windDirection,
    shortForecast: period.shortForecast,
    chanceOfPrecipitation: formatPrecipitation(period.precipitationProbability),
  };
}

export function formatJsonReport(report: ForecastReport): string {
  const output: JsonReport = {
    locationName: formatPlaceName(report.location),
    latitude: report.location.latitude,
    longitude: report.location.longitude,
    errorMessage: null,
    forecastPeriods: report.periods.map(toJsonPeriod),
    source: report.source,
  };
  return JSON.stringify(output, null, 2) + '\n';
}

/**
 * JSON error object; carries no forecast periods
 */
export function formatJsonError(message: string, location?: GeoLocation): string {
  const output: JsonReport = {
    locationName: location ? formatPlaceName(location) : null,
    latitude: location ? location.latitude : null,
    longitude: location ? location.longitude : null,
    errorMessage: message,
    forecastPeriods: [],
  };
  return JSON.stringify(output, null, 2) + '\n';
}

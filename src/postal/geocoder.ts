/**
 * Offline postal code to coordinate resolution
 */

import { logger } from '../domain/logger.js';
import type { GeoLocation, LookupResult } from '../domain/types.js';
import type { PostalDataset } from './types.js';

const ZIP_PLUS_FOUR = /^(\d{5})[-\s]?\d{4}$/;

/**
 * Normalize a user-entered postal code
 *
 * Trims whitespace and reduces ZIP+4 to the five-digit ZIP.
 */
export function normalizePostalCode(input: string): string {
  const trimmed = input.trim();
  const plusFour = ZIP_PLUS_FOUR.exec(trimmed);
  return plusFour ? plusFour[1] : trimmed.toUpperCase();
}

function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    lat >= -90 &&
    lat <= 90 &&
    lon >= -180 &&
    lon <= 180
  );
}

/**
 * Display label for a location, "Place, ST"
 */
export function formatPlaceName(location: Pick<GeoLocation, 'placeName' | 'stateCode'>): string {
  return location.stateCode
    ? `${location.placeName}, ${location.stateCode}`
    : location.placeName;
}

export class Geocoder {
  constructor(private readonly dataset: PostalDataset) {}

  /**
   * Resolve a postal code against the offline dataset
   *
   * Unknown codes and records without usable coordinates come back as
   * `not_found`; this never throws for bad input.
   */
  resolve(postalCode: string): LookupResult {
    const code = normalizePostalCode(postalCode);
    if (code === '') {
      return { kind: 'not_found', postalCode: code, reason: 'empty_input' };
    }

    const record = this.dataset.lookup(code);
    if (!record) {
      logger.debug('Postal code not in dataset', { postalCode: code, dataset: this.dataset.name });
      return { kind: 'not_found', postalCode: code, reason: 'unknown_code' };
    }

    if (!isValidCoordinate(record.latitude, record.longitude)) {
      logger.debug('Postal code has no usable coordinates', {
        postalCode: code,
        latitude: record.latitude,
        longitude: record.longitude,
      });
      return { kind: 'not_found', postalCode: code, reason: 'missing_coordinates' };
    }

    const location: GeoLocation = Object.freeze({
      postalCode: code,
      latitude: record.latitude,
      longitude: record.longitude,
      placeName: record.placeName || 'N/A',
      stateCode: record.stateCode || '',
    });

    return { kind: 'found', location };
  }
}

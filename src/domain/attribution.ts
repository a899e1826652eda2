/**
 * Attribution helper for National Weather Service data
 */

import type { Attribution, SourceMetadata } from './types.js';

/**
 * NWS data is public domain; the disclaimer page is the reference
 */
const NWS_LICENSE_URI = 'https://www.weather.gov/disclaimer';
const NWS_CREDIT_LINE =
  'Data from the National Weather Service API (https://api.weather.gov/)';

/**
 * Get National Weather Service attribution information
 */
export function getAttribution(): Attribution {
  return {
    licenseUri: NWS_LICENSE_URI,
    creditLine: NWS_CREDIT_LINE,
  };
}

/**
 * Build source metadata for a forecast report
 *
 * @param product - Name of the NWS product (e.g., "Gridpoint Forecast")
 * @returns Complete source metadata object
 */
export function buildSourceMetadata(product: string): SourceMetadata {
  const attribution = getAttribution();

  return {
    provider: 'National Weather Service',
    product,
    licenseUri: attribution.licenseUri,
    creditLine: attribution.creditLine,
  };
}

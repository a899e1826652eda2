/**
 * Bundled US ZIP table from the zipcodes package
 */

import zipcodes from 'zipcodes';
import type { PostalDataset, PostalRecord } from './types.js';

export class ZipcodesDataset implements PostalDataset {
  readonly name = 'zipcodes';

  lookup(postalCode: string): PostalRecord | undefined {
    const entry = zipcodes.lookup(postalCode);
    if (!entry || entry.country !== 'US') {
      return undefined;
    }

    // The table stores 0,0 for codes without a position (APO/FPO/DPO)
    const unplaced = Number(entry.latitude) === 0 && Number(entry.longitude) === 0;

    return {
      postalCode: entry.zip,
      placeName: entry.city || null,
      stateCode: entry.state || null,
      latitude: unplaced ? NaN : Number(entry.latitude),
      longitude: unplaced ? NaN : Number(entry.longitude),
    };
  }

  // Static in-memory table; nothing to release
  close(): void {}
}

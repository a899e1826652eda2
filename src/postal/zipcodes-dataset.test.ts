/**
 * Unit tests for the bundled ZIP table
 */

import { describe, it, expect } from 'vitest';
import { ZipcodesDataset } from './zipcodes-dataset.js';
import { Geocoder } from './geocoder.js';

describe('ZipcodesDataset', () => {
  const dataset = new ZipcodesDataset();

  it('should find a well-known ZIP', () => {
    const record = dataset.lookup('90210');

    expect(record).toMatchObject({
      postalCode: '90210',
      placeName: 'Beverly Hills',
      stateCode: 'CA',
    });
  });

  it('should return undefined for an unassigned ZIP', () => {
    expect(dataset.lookup('00000')).toBeUndefined();
  });

  it('should treat the 0,0 placeholder as missing coordinates', () => {
    const record = dataset.lookup('34001');

    expect(record?.postalCode).toBe('34001');
    expect(record?.latitude).toBeNaN();
    expect(record?.longitude).toBeNaN();
  });

  it('should not resolve a military ZIP without a position', () => {
    expect(new Geocoder(dataset).resolve('34001')).toEqual({
      kind: 'not_found',
      postalCode: '34001',
      reason: 'missing_coordinates',
    });
  });

  it('should resolve every listed US code within bounds or reject it', () => {
    const geocoder = new Geocoder(dataset);
    let found = 0;

    for (let n = 0; n <= 99999; n++) {
      const zip = String(n).padStart(5, '0');
      if (!dataset.lookup(zip)) {
        continue;
      }

      const result = geocoder.resolve(zip);
      if (result.kind === 'not_found') {
        expect(result.reason).toBe('missing_coordinates');
        continue;
      }

      found++;
      const { latitude, longitude } = result.location;
      expect(latitude).toBeGreaterThanOrEqual(-90);
      expect(latitude).toBeLessThanOrEqual(90);
      expect(longitude).toBeGreaterThanOrEqual(-180);
      expect(longitude).toBeLessThanOrEqual(180);
      expect(latitude === 0 && longitude === 0).toBe(false);
    }

    expect(found).toBeGreaterThan(30000);
  });

  it.each(['90210', '10001', '60601', '98101', '33101', '02108'])(
    'should resolve %s within geographic bounds',
    (zip) => {
      const result = new Geocoder(dataset).resolve(zip);

      expect(result.kind).toBe('found');
      if (result.kind === 'found') {
        const { latitude, longitude } = result.location;
        expect(latitude).toBeGreaterThanOrEqual(-90);
        expect(latitude).toBeLessThanOrEqual(90);
        expect(longitude).toBeGreaterThanOrEqual(-180);
        expect(longitude).toBeLessThanOrEqual(180);
      }
    }
  );
});

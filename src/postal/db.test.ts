/**
 * Unit tests for the SQLite postal database and the GeoNames import
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { PostalCodeDB } from './db.js';
import { importGeoNames, importGeoNamesFile, parseGeoNames } from './import.js';
import { Geocoder } from './geocoder.js';

const GEONAMES_SAMPLE = [
  'US\t90210\tBeverly Hills\tCalifornia\tCA\tLos Angeles\t037\t\t\t34.0901\t-118.4065\t4',
  'US\t10001\tNew York City\tNew York\tNY\tNew York\t061\t\t\t40.7484\t-73.9967\t4',
  'US\t99999\tNowhere\tAlaska\tAK\t\t\t\t\t\t\t',
  'CA\tH0H\tReserved (Santa Claus)\tQuebec\tQC\t\t\t\t\t90.0000\t0.0000\t1',
  '',
].join('\n');

describe('parseGeoNames', () => {
  it('should keep US rows only', () => {
    const rows = parseGeoNames(GEONAMES_SAMPLE);

    expect(rows.map((r) => r.postal_code)).toEqual(['90210', '10001', '99999']);
  });

  it('should map the columns', () => {
    const [first] = parseGeoNames(GEONAMES_SAMPLE);

    expect(first).toEqual({
      postal_code: '90210',
      place_name: 'Beverly Hills',
      state_name: 'California',
      state_code: 'CA',
      county_name: 'Los Angeles',
      latitude: 34.0901,
      longitude: -118.4065,
      accuracy: 4,
    });
  });

  it('should store empty coordinates as null', () => {
    const rows = parseGeoNames(GEONAMES_SAMPLE);

    expect(rows[2]).toMatchObject({ latitude: null, longitude: null, county_name: null });
  });
});

describe('PostalCodeDB', () => {
  let connection: Database.Database;
  let db: PostalCodeDB;

  beforeEach(() => {
    connection = new Database(':memory:');
    importGeoNames(connection, GEONAMES_SAMPLE, 'US.txt');
    db = new PostalCodeDB(connection);
  });

  afterEach(() => {
    db.close();
  });

  it('should look up an imported code', () => {
    expect(db.lookup('10001')).toEqual({
      postalCode: '10001',
      placeName: 'New York City',
      stateCode: 'NY',
      latitude: 40.7484,
      longitude: -73.9967,
    });
  });

  it('should return undefined for an unknown code', () => {
    expect(db.lookup('00000')).toBeUndefined();
  });

  it('should return NaN coordinates for rows without them', () => {
    const record = db.lookup('99999');

    expect(record?.latitude).toBeNaN();
    expect(record?.longitude).toBeNaN();
  });

  it('should let the geocoder reject rows without coordinates', () => {
    expect(new Geocoder(db).resolve('99999')).toEqual({
      kind: 'not_found',
      postalCode: '99999',
      reason: 'missing_coordinates',
    });
  });

  it('should report stats and import metadata', () => {
    const stats = db.getStats();

    expect(stats.totalPostalCodes).toBe(3);
    expect(stats.metadata.source).toBe('US.txt');
    expect(stats.metadata.row_count).toBe('3');
  });

  it('should replace rows on a second import', () => {
    const updated = 'US\t10001\tManhattan\tNew York\tNY\tNew York\t061\t\t\t40.7500\t-73.9970\t4';

    const count = importGeoNames(connection, updated, 'update.txt');

    expect(count).toBe(1);
    expect(db.lookup('10001')?.placeName).toBe('Manhattan');
    expect(db.getStats().totalPostalCodes).toBe(3);
  });
});

describe('importGeoNamesFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'zipcast-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should build a database that opens read-only', () => {
    const source = join(dir, 'US.txt');
    const target = join(dir, 'postal.db');
    writeFileSync(source, GEONAMES_SAMPLE);

    expect(importGeoNamesFile(source, target)).toEqual({ imported: 3, totalPostalCodes: 3 });

    const db = new PostalCodeDB(target);
    try {
      expect(db.lookup('90210')?.placeName).toBe('Beverly Hills');
    } finally {
      db.close();
    }
  });

  it('should count rows kept from an earlier import', () => {
    const first = join(dir, 'US.txt');
    const second = join(dir, 'update.txt');
    const target = join(dir, 'postal.db');
    writeFileSync(first, GEONAMES_SAMPLE);
    writeFileSync(
      second,
      'US\t02108\tBoston\tMassachusetts\tMA\tSuffolk\t025\t\t\t42.3576\t-71.0684\t4\n'
    );

    importGeoNamesFile(first, target);

    expect(importGeoNamesFile(second, target)).toEqual({ imported: 1, totalPostalCodes: 4 });
  });

  it('should refuse to open a missing database', () => {
    expect(() => new PostalCodeDB(join(dir, 'missing.db'))).toThrow(
      `Could not open postal database at ${join(dir, 'missing.db')}`
    );
  });
});

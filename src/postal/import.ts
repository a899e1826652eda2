/**
 * Import of GeoNames postal code dumps (e.g. US.txt) into SQLite
 *
 * Columns, tab separated: country code, postal code, place name,
 * admin name1, admin code1, admin name2, admin code2, admin name3,
 * admin code3, latitude, longitude, accuracy.
 */

import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';
import { logger } from '../domain/logger.js';
import { PostalCodeDB, createPostalSchema } from './db.js';
import type { PostalCodeRow } from './types.js';

const GEONAMES_COLUMNS = 12;

function emptyToNull(value: string | undefined): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed === '' ? null : trimmed;
}

function parseOptionalNumber(value: string | undefined): number | null {
  const trimmed = emptyToNull(value);
  if (trimmed === null) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a GeoNames dump, keeping rows for the given country
 */
export function parseGeoNames(text: string, countryCode = 'US'): PostalCodeRow[] {
  const rows: PostalCodeRow[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') {
      continue;
    }

    const cols = line.split('\t');
    if (cols.length < GEONAMES_COLUMNS - 1 || cols[0] !== countryCode) {
      continue;
    }

    const postalCode = emptyToNull(cols[1]);
    if (postalCode === null) {
      continue;
    }

    rows.push({
      postal_code: postalCode,
      place_name: emptyToNull(cols[2]),
      state_name: emptyToNull(cols[3]),
      state_code: emptyToNull(cols[4]),
      county_name: emptyToNull(cols[5]),
      latitude: parseOptionalNumber(cols[9]),
      longitude: parseOptionalNumber(cols[10]),
      accuracy: parseOptionalNumber(cols[11]),
    });
  }

  return rows;
}

/**
 * Insert a GeoNames dump into an open database in one transaction
 *
 * @returns Number of rows written
 */
export function importGeoNames(
  db: Database.Database,
  text: string,
  source = 'inline'
): number {
  createPostalSchema(db);
  const rows = parseGeoNames(text);

  const insert = db.prepare<[PostalCodeRow]>(`
    INSERT OR REPLACE INTO postal_codes
      (postal_code, place_name, state_name, state_code, county_name, latitude, longitude, accuracy)
    VALUES
      (@postal_code, @place_name, @state_name, @state_code, @county_name, @latitude, @longitude, @accuracy)
  `);
  const setMeta = db.prepare<[string, string]>(
    'INSERT OR REPLACE INTO _metadata (key, value) VALUES (?, ?)'
  );

  const writeAll = db.transaction((batch: PostalCodeRow[]) => {
    for (const row of batch) {
      insert.run(row);
    }
    setMeta.run('source', source);
    setMeta.run('imported_at', new Date().toISOString());
    setMeta.run('row_count', String(batch.length));
  });
  writeAll(rows);

  logger.info('Imported postal codes', { source, rows: rows.length });
  return rows.length;
}

export interface ImportSummary {
  /** Rows written by this import */
  imported: number;
  /** Rows in the table afterwards, earlier imports included */
  totalPostalCodes: number;
}

/**
 * Build (or refresh) a postal database file from a GeoNames dump on disk
 */
export function importGeoNamesFile(sourcePath: string, dbPath: string): ImportSummary {
  const text = readFileSync(sourcePath, 'utf8');
  const db = new Database(dbPath);
  try {
    const imported = importGeoNames(db, text, sourcePath);
    const { totalPostalCodes } = new PostalCodeDB(db).getStats();
    return { imported, totalPostalCodes };
  } finally {
    db.close();
  }
}

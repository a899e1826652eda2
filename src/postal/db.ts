/**
 * PostalCodeDB - SQLite access layer for an imported US postal code table
 */

import Database from 'better-sqlite3';
import { logger } from '../domain/logger.js';
import type { PostalCodeRow, PostalDataset, PostalRecord } from './types.js';

export const POSTAL_SCHEMA = `
  CREATE TABLE IF NOT EXISTS postal_codes (
    postal_code TEXT PRIMARY KEY,
    place_name TEXT,
    state_name TEXT,
    state_code TEXT,
    county_name TEXT,
    latitude REAL,
    longitude REAL,
    accuracy INTEGER
  );
  CREATE TABLE IF NOT EXISTS _metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

/**
 * Create the postal tables on a writable connection
 */
export function createPostalSchema(db: Database.Database): void {
  db.exec(POSTAL_SCHEMA);
}

export class PostalCodeDB implements PostalDataset {
  readonly name: string;
  private db: Database.Database;

  /**
   * @param source - Path of a database built by `import-postal-codes`
   *   (opened read-only), or an already open connection
   */
  constructor(source: string | Database.Database) {
    if (typeof source !== 'string') {
      this.db = source;
      this.name = `sqlite:${source.name}`;
      return;
    }

    this.name = `sqlite:${source}`;
    try {
      this.db = new Database(source, { readonly: true, fileMustExist: true });
      logger.info('PostalCodeDB initialized', { dbPath: source });
    } catch (error) {
      logger.error('Failed to open postal database', { dbPath: source, error: String(error) });
      throw new Error(`Could not open postal database at ${source}: ${error}`);
    }
  }

  /**
   * Exact lookup on postal_code
   */
  findByCode(postalCode: string): PostalCodeRow | undefined {
    const stmt = this.db.prepare<[string], PostalCodeRow>(
      'SELECT * FROM postal_codes WHERE postal_code = ?'
    );
    return stmt.get(postalCode);
  }

  lookup(postalCode: string): PostalRecord | undefined {
    const row = this.findByCode(postalCode);
    if (!row) {
      return undefined;
    }

    return {
      postalCode: row.postal_code,
      placeName: row.place_name,
      stateCode: row.state_code,
      latitude: row.latitude ?? NaN,
      longitude: row.longitude ?? NaN,
    };
  }

  /**
   * Get metadata about the import
   */
  getMetadata(): Record<string, string> {
    try {
      const stmt = this.db.prepare<[], { key: string; value: string }>(
        'SELECT key, value FROM _metadata'
      );
      return Object.fromEntries(stmt.all().map((r) => [r.key, r.value]));
    } catch (error) {
      logger.warn('Could not read metadata from postal database', { error: String(error) });
      return {};
    }
  }

  /**
   * Get statistics about the database
   */
  getStats(): { totalPostalCodes: number; metadata: Record<string, string> } {
    const countStmt = this.db.prepare<[], { count: number }>(
      'SELECT COUNT(*) as count FROM postal_codes'
    );
    const row = countStmt.get();

    return {
      totalPostalCodes: row ? row.count : 0,
      metadata: this.getMetadata(),
    };
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
    logger.debug('PostalCodeDB connection closed', { name: this.name });
  }
}

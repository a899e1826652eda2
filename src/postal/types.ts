/**
 * Types for the postal domain (US ZIP code lookup)
 */

/** Row of an offline postal dataset */
export interface PostalRecord {
  postalCode: string;
  placeName: string | null;
  stateCode: string | null;
  /** NaN when the dataset has no coordinates for the code */
  latitude: number;
  longitude: number;
}

/** Read-only offline lookup collaborator */
export interface PostalDataset {
  /** Human-readable name, used in logs */
  readonly name: string;
  lookup(postalCode: string): PostalRecord | undefined;
  close(): void;
}

/** Raw row of the postal_codes table */
export interface PostalCodeRow {
  postal_code: string;
  place_name: string | null;
  state_name: string | null;
  state_code: string | null;
  county_name: string | null;
  latitude: number | null;
  longitude: number | null;
  accuracy: number | null;
}

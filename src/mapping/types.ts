// Canonical patient model shared by the resolver, unwrapper and presenter.

export const CANONICAL_FIELDS = [
  "id",
  "name",
  "age",
  "diagnosis",
  "medications",
  "allergies",
  "lastUpdated",
  "department",
  "status",
  "admitted",
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type RawRecord = { [key: string]: JsonValue };

/**
 * Upstream field names per canonical field, tried in declared order.
 */
export type AliasTable = Partial<Record<CanonicalField, readonly string[]>>;

export interface CanonicalPatient {
  id: string;
  name: string;
  age: number;
  diagnosis: string;
  medications: string[];
  allergies: string[];
  lastUpdated: string;
  department: string;
  status: string;
  admitted: string;
}

export type PatientSet = readonly CanonicalPatient[];

export interface NormalizeOptions {
  nameFilter?: string;
  limit?: number;
}

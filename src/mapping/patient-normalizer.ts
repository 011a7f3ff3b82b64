import { resolve } from "./field-resolver.js";
import { unwrap } from "./response-unwrapper.js";
import type { AliasTable, CanonicalPatient, NormalizeOptions, PatientSet } from "./types.js";

export function matchesName(patient: CanonicalPatient, nameFilter: string): boolean {
  return patient.name.toLowerCase().includes(nameFilter.toLowerCase());
}

/**
 * Turns one upstream payload into canonical patients.
 *
 * Filtering runs on canonical names, after resolution, so it behaves the same
 * whichever field the upstream used for the name. A blank filter is ignored; a
 * limit of zero or less yields an empty set.
 */
export function normalize(envelope: unknown, table: AliasTable, options: NormalizeOptions = {}): PatientSet {
  const nameFilter = options.nameFilter?.trim();
  const { limit } = options;

  const records = unwrap(envelope);
  if (limit !== undefined && limit <= 0) return [];

  let patients = records.map((raw) => resolve(raw, table));
  if (nameFilter) {
    patients = patients.filter((patient) => matchesName(patient, nameFilter));
  }
  return limit === undefined ? patients : patients.slice(0, limit);
}

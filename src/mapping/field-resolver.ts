import type { AliasTable, CanonicalField, CanonicalPatient, JsonValue, RawRecord } from "./types.js";

type FieldsOf<T> = { [K in CanonicalField]: CanonicalPatient[K] extends T ? K : never }[CanonicalField];

export type TextField = FieldsOf<string>;
export type IntegerField = FieldsOf<number>;
export type ListField = FieldsOf<string[]>;

// Value used when none of a field's aliases is present.
export const FIELD_DEFAULTS: { readonly [K in CanonicalField]: { fallback: CanonicalPatient[K] } } = {
  id: { fallback: "N/A" },
  name: { fallback: "Unknown" },
  age: { fallback: 0 },
  diagnosis: { fallback: "N/A" },
  medications: { fallback: [] },
  allergies: { fallback: [] },
  lastUpdated: { fallback: "N/A" },
  department: { fallback: "N/A" },
  status: { fallback: "N/A" },
  admitted: { fallback: "N/A" },
};

const INTEGER_PATTERN = /^\s*[-+]?\d+(\.\d+)?\s*$/;

function stringify(value: JsonValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export function toText(value: JsonValue, fallback: string): string {
  if (value === null) return fallback;
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null).map(stringify).join(", ");
  }
  return stringify(value);
}

export function toInteger(value: JsonValue, fallback: number): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
    return Math.trunc(Number(value));
  }
  return fallback;
}

function nonBlank(parts: string[]): string[] {
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

export function toStringList(value: JsonValue): string[] {
  if (value === null) return [];
  if (typeof value === "string") {
    return nonBlank(value.split(","));
  }
  if (Array.isArray(value)) {
    return nonBlank(value.filter((item) => item !== null).map(stringify));
  }
  return [stringify(value)];
}

/**
 * Returns the value under the first alias present in `raw`, even when that value
 * is null or empty. `undefined` means no alias matched.
 */
export function pickAlias(raw: RawRecord, aliases: readonly string[]): JsonValue | undefined {
  for (const alias of aliases) {
    if (Object.prototype.hasOwnProperty.call(raw, alias)) {
      return raw[alias];
    }
  }
  return undefined;
}

function aliasesFor(field: CanonicalField, table: AliasTable): readonly string[] {
  return table[field] ?? [field];
}

function resolveText(raw: RawRecord, field: TextField, table: AliasTable): string {
  const { fallback } = FIELD_DEFAULTS[field];
  const value = pickAlias(raw, aliasesFor(field, table));
  return value === undefined ? fallback : toText(value, fallback);
}

function resolveInteger(raw: RawRecord, field: IntegerField, table: AliasTable): number {
  const { fallback } = FIELD_DEFAULTS[field];
  const value = pickAlias(raw, aliasesFor(field, table));
  return value === undefined ? fallback : toInteger(value, fallback);
}

function resolveList(raw: RawRecord, field: ListField, table: AliasTable): string[] {
  const value = pickAlias(raw, aliasesFor(field, table));
  return value === undefined ? [...FIELD_DEFAULTS[field].fallback] : toStringList(value);
}

/**
 * Maps an upstream record onto the canonical patient shape. Never throws.
 */
export function resolve(raw: RawRecord, table: AliasTable): CanonicalPatient {
  return {
    id: resolveText(raw, "id", table),
    name: resolveText(raw, "name", table),
    age: resolveInteger(raw, "age", table),
    diagnosis: resolveText(raw, "diagnosis", table),
    medications: resolveList(raw, "medications", table),
    allergies: resolveList(raw, "allergies", table),
    lastUpdated: resolveText(raw, "lastUpdated", table),
    department: resolveText(raw, "department", table),
    status: resolveText(raw, "status", table),
    admitted: resolveText(raw, "admitted", table),
  };
}

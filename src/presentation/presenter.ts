import { isPatientDirectoryError } from "../errors.js";
import { FIELD_DEFAULTS, type TextField } from "../mapping/field-resolver.js";
import type { CanonicalField, CanonicalPatient, NormalizeOptions, PatientSet } from "../mapping/types.js";
import { TOOL_CATALOG } from "../tools/catalog.js";

export const NONE_REPORTED = "None reported";

const RECORD_HEADER = "📋 Patient #";

/**
 * Fixed labels, one line per canonical field. Callers may grep rendered text
 * for `<icon> <label>: `, so these are part of the output contract.
 */
export const FIELD_LINES: readonly { field: CanonicalField; icon: string; label: string }[] = [
  { field: "name", icon: "👤", label: "Name" },
  { field: "id", icon: "🆔", label: "ID" },
  { field: "age", icon: "🎂", label: "Age" },
  { field: "diagnosis", icon: "🏥", label: "Diagnosis" },
  { field: "medications", icon: "💊", label: "Medications" },
  { field: "allergies", icon: "⚠️", label: "Allergies" },
  { field: "lastUpdated", icon: "📅", label: "Last Updated" },
  { field: "department", icon: "🏢", label: "Department" },
  { field: "status", icon: "📊", label: "Status" },
  { field: "admitted", icon: "📆", label: "Admitted" },
];

export type PatientQuery = NormalizeOptions;

export type PatientListPayload = {
  query: { patientName: string | null; limit: number | null };
  count: number;
  patients: CanonicalPatient[];
};

function linePrefix(icon: string, label: string): string {
  return `${icon} ${label}: `;
}

const LIST_SEPARATOR = ", ";

// Backslash escapes keep one field on one line and list elements separable:
// `\\`, `\n` and `\r` everywhere, plus `\,` inside list elements.
function escapeText(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/\r/g, "\\r");
}

function escapeListElement(value: string): string {
  const escaped = escapeText(value).replace(/,/g, "\\,");
  // a lone element reading "None reported" must not scan back as an empty list
  return escaped === NONE_REPORTED ? `\\${escaped}` : escaped;
}

function formatValue(value: CanonicalPatient[CanonicalField]): string {
  if (Array.isArray(value)) {
    return value.length > 0 ? value.map(escapeListElement).join(LIST_SEPARATOR) : NONE_REPORTED;
  }
  return typeof value === "string" ? escapeText(value) : String(value);
}

function describeQuery(query: PatientQuery): string {
  const parts: string[] = [];
  if (query.nameFilter?.trim()) parts.push(` matching "${query.nameFilter.trim()}"`);
  if (query.limit !== undefined) parts.push(` (limit ${query.limit})`);
  return parts.join("");
}

function renderPatient(patient: CanonicalPatient, position: number): string {
  const lines = [`${RECORD_HEADER}${position}`];
  for (const { field, icon, label } of FIELD_LINES) {
    lines.push(`   ${linePrefix(icon, label)}${formatValue(patient[field])}`);
  }
  return lines.join("\n");
}

export function renderNoMatch(query: PatientQuery): string {
  const name = query.nameFilter?.trim();
  return name
    ? `🔍 No patients found matching "${name}".`
    : "🔍 No patients found matching the specified criteria.";
}

export function render(set: PatientSet, query: PatientQuery = {}): string {
  if (set.length === 0) return renderNoMatch(query);
  const header = `Found ${set.length} patient(s)${describeQuery(query)}:`;
  return [header, ...set.map((patient, index) => renderPatient(patient, index + 1))].join("\n\n");
}

export function toPayload(set: PatientSet, query: PatientQuery = {}): PatientListPayload {
  return {
    query: {
      patientName: query.nameFilter?.trim() || null,
      limit: query.limit ?? null,
    },
    count: set.length,
    patients: set.map((patient) => ({
      ...patient,
      medications: [...patient.medications],
      allergies: [...patient.allergies],
    })),
  };
}

/**
 * User-facing text for a failed lookup. Never includes the underlying error
 * message, which can carry URLs or upstream bodies.
 */
export function renderError(cause: unknown): string {
  if (isPatientDirectoryError(cause)) {
    switch (cause.kind) {
      case "upstream_unreachable":
        return "❌ The patient directory could not be reached. Please try again in a moment.";
      case "malformed_response":
        return "❌ The patient directory returned data in a format that could not be read.";
      case "upstream_status":
        return "❌ The patient directory rejected the request. Please check the service configuration.";
    }
  }
  return "❌ Something went wrong while retrieving patient data. Please try again.";
}

export function renderToolCatalog(): string {
  const lines = ["🛠️ Available tools:"];
  for (const tool of TOOL_CATALOG) {
    lines.push("", `• ${tool.name} (${tool.title}): ${tool.description}`);
    if (tool.parameters.length === 0) {
      lines.push("   No arguments.");
    }
    for (const param of tool.parameters) {
      const presence = param.required ? "required" : "optional";
      lines.push(`   - ${param.name} (${param.type}, ${presence}): ${param.description}`);
    }
  }
  return lines.join("\n");
}

export function renderHelp(): string {
  return [
    "💡 I can look up patients in the patient directory. Try:",
    '   • "show all patients"',
    '   • "find patients named Smith"',
    '   • "list 5 patients with allergies"',
    '   • "what tools do you have"',
    "After a patient search, reply with a number to change how many results you get.",
    'Type "help" at any time to see this message again.',
  ].join("\n");
}

export function renderGreeting(name?: string): string {
  const who = name ? ` ${name}` : "";
  return `👋 Hello${who}! I can search the patient directory for you. Type "help" to see what I can do.`;
}

export function renderUnknown(utterance: string): string {
  const text = utterance.trim();
  if (!text) return `🤔 I didn't catch that. Type "help" to see what I can do.`;
  return `🤔 I didn't understand "${text}". Try "find patients named Smith", or type "help" to see what I can do.`;
}

/**
 * Reads patients back out of {@link render} output by their field labels.
 */
export function scanRenderedPatients(text: string): CanonicalPatient[] {
  const patients: CanonicalPatient[] = [];
  let current: Partial<Record<CanonicalField, string>> | undefined;

  const flush = () => {
    if (current) patients.push(fromScannedFields(current));
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trimStart();
    if (line.startsWith(RECORD_HEADER)) {
      flush();
      current = {};
      continue;
    }
    if (!current) continue;
    for (const { field, icon, label } of FIELD_LINES) {
      const prefix = linePrefix(icon, label);
      if (line.startsWith(prefix)) {
        current[field] = line.slice(prefix.length);
        break;
      }
    }
  }
  flush();
  return patients;
}

function unescapeChar(c: string): string {
  if (c === "n") return "\n";
  if (c === "r") return "\r";
  return c;
}

/**
 * Undoes {@link escapeText}; with `splitList`, also splits on unescaped `", "`.
 */
function unescapeValue(value: string, splitList: boolean): string[] {
  const parts: string[] = [];
  let current = "";
  for (let i = 0; i < value.length; i++) {
    const c = value.charAt(i);
    if (c === "\\" && i + 1 < value.length) {
      current += unescapeChar(value.charAt(i + 1));
      i++;
    } else if (splitList && value.startsWith(LIST_SEPARATOR, i)) {
      parts.push(current);
      current = "";
      i += LIST_SEPARATOR.length - 1;
    } else {
      current += c;
    }
  }
  parts.push(current);
  return parts;
}

function scannedList(value: string | undefined): string[] {
  if (value === undefined || value === NONE_REPORTED) return [];
  return unescapeValue(value, true);
}

function scannedText(value: string | undefined, field: TextField): string {
  return value === undefined ? FIELD_DEFAULTS[field].fallback : unescapeValue(value, false).join("");
}

function fromScannedFields(fields: Partial<Record<CanonicalField, string>>): CanonicalPatient {
  const age = Number(fields.age);
  return {
    id: scannedText(fields.id, "id"),
    name: scannedText(fields.name, "name"),
    age: Number.isInteger(age) ? age : FIELD_DEFAULTS.age.fallback,
    diagnosis: scannedText(fields.diagnosis, "diagnosis"),
    medications: scannedList(fields.medications),
    allergies: scannedList(fields.allergies),
    lastUpdated: scannedText(fields.lastUpdated, "lastUpdated"),
    department: scannedText(fields.department, "department"),
    status: scannedText(fields.status, "status"),
    admitted: scannedText(fields.admitted, "admitted"),
  };
}

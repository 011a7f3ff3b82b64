import { MalformedResponseError } from "../errors.js";
import type { JsonValue, RawRecord } from "./types.js";

export const ENVELOPE_KEYS = ["data", "patients", "results", "records"] as const;

export type EnvelopeShape = "array" | "envelopeKey" | "arrayMember" | "singleRecord";

type ShapeDetector = {
  shape: EnvelopeShape;
  detect: (envelope: JsonValue[] | RawRecord) => RawRecord[] | undefined;
};

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function recordsOf(items: JsonValue[]): RawRecord[] {
  return items.filter(isRecord);
}

const DETECTORS: readonly ShapeDetector[] = [
  {
    shape: "array",
    detect: (envelope) => (Array.isArray(envelope) ? recordsOf(envelope) : undefined),
  },
  {
    shape: "envelopeKey",
    detect: (envelope) => {
      if (Array.isArray(envelope)) return undefined;
      for (const key of ENVELOPE_KEYS) {
        const value = envelope[key];
        if (Array.isArray(value)) return recordsOf(value);
      }
      return undefined;
    },
  },
  {
    // An empty array could as well be a list-valued field of a single record,
    // so only non-empty arrays made entirely of objects count here.
    shape: "arrayMember",
    detect: (envelope) => {
      if (Array.isArray(envelope)) return undefined;
      for (const value of Object.values(envelope)) {
        if (Array.isArray(value) && value.length > 0 && value.every(isRecord)) {
          return recordsOf(value);
        }
      }
      return undefined;
    },
  },
  {
    shape: "singleRecord",
    detect: (envelope) => (Array.isArray(envelope) ? undefined : [envelope]),
  },
];

export interface UnwrapResult {
  shape: EnvelopeShape;
  records: RawRecord[];
}

/**
 * Like {@link unwrap}, but also reports which envelope shape matched.
 */
export function detectEnvelope(envelope: unknown): UnwrapResult {
  if (!Array.isArray(envelope) && !isRecord(envelope)) {
    throw new MalformedResponseError(envelope === null ? "null" : typeof envelope);
  }
  for (const detector of DETECTORS) {
    const records = detector.detect(envelope);
    if (records) return { shape: detector.shape, records };
  }
  // singleRecord always matches an object, and array always matches an array
  throw new MalformedResponseError(typeof envelope);
}

/**
 * Locates the list of records inside an upstream payload, whatever envelope it
 * arrived in. Throws {@link MalformedResponseError} only for scalars and null.
 */
export function unwrap(envelope: unknown): RawRecord[] {
  return detectEnvelope(envelope).records;
}

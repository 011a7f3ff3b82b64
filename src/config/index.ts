import dotenv from "dotenv";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { AliasTable } from "../mapping/types.js";

dotenv.config();

const positiveInt = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().optional(),
  RUN_MODE: z.enum(["http", "stdio"]).optional(),

  PATIENT_API_BASE_URL: z.string().url().optional(),
  PATIENT_API_ENDPOINT: z.string().optional(),
  PATIENT_API_NAME_PARAM: z.string().optional(),
  PATIENT_API_TIMEOUT_MS: positiveInt,
  PATIENT_API_DEFAULT_LIMIT: positiveInt,

  PATIENT_API_AUTH_TYPE: z.enum(["none", "bearer", "api_key", "basic"]).optional(),
  PATIENT_API_TOKEN: z.string().optional(),
  PATIENT_API_AUTH_HEADER: z.string().optional(),
  PATIENT_API_USERNAME: z.string().optional(),
  PATIENT_API_PASSWORD: z.string().optional(),

  FIELD_MAPPING_FILE: z.string().optional(),
  CHAT_HISTORY_LIMIT: positiveInt,
  CHAT_MAX_SESSIONS: positiveInt,
});

const aliasList = z.array(z.string().min(1)).optional();

const aliasTableSchema = z
  .object({
    id: aliasList,
    name: aliasList,
    age: aliasList,
    diagnosis: aliasList,
    medications: aliasList,
    allergies: aliasList,
    lastUpdated: aliasList,
    department: aliasList,
    status: aliasList,
    admitted: aliasList,
  })
  .strict();

export type AuthConfig =
  | { type: "none" }
  | { type: "bearer"; token: string }
  | { type: "api_key"; token: string; headerName: string }
  | { type: "basic"; username: string; password: string };

export type PatientApiConfig = {
  baseUrl: string;
  endpointPath: string;
  nameParam: string;
  timeoutMs: number;
  defaultLimit: number;
  auth: AuthConfig;
};

export type AppConfig = {
  port: number;
  runMode: "http" | "stdio";
  patientApi: PatientApiConfig;
  aliasTable: AliasTable;
  chat: {
    historyLimit: number;
    // least recently used sessions are dropped past this count
    maxSessions: number;
  };
};

export const DEFAULT_FIELD_MAPPING_FILE = fileURLToPath(new URL("../../config/field-mapping.json", import.meta.url));

type EnvValues = z.infer<typeof envSchema>;

function buildAuth(values: EnvValues): AuthConfig {
  const type = values.PATIENT_API_AUTH_TYPE ?? "none";
  const token = values.PATIENT_API_TOKEN ?? "";
  switch (type) {
    case "bearer":
      if (!token) throw new Error("PATIENT_API_TOKEN is required when PATIENT_API_AUTH_TYPE=bearer");
      return { type, token };
    case "api_key":
      if (!token) throw new Error("PATIENT_API_TOKEN is required when PATIENT_API_AUTH_TYPE=api_key");
      return { type, token, headerName: values.PATIENT_API_AUTH_HEADER ?? "X-API-Key" };
    case "basic":
      if (!values.PATIENT_API_USERNAME) {
        throw new Error("PATIENT_API_USERNAME is required when PATIENT_API_AUTH_TYPE=basic");
      }
      return { type, username: values.PATIENT_API_USERNAME, password: values.PATIENT_API_PASSWORD ?? "" };
    case "none":
      return { type };
  }
}

/**
 * Reads and validates an alias table file. Keys must be canonical field names;
 * fields left out fall back to their own name as the only alias.
 */
export function loadAliasTable(path: string): AliasTable {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return aliasTableSchema.parse(raw);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT ?? 5000,
    runMode: parsed.RUN_MODE ?? "http",
    patientApi: {
      baseUrl: (parsed.PATIENT_API_BASE_URL ?? "http://localhost:5010/api").replace(/\/$/, ""),
      endpointPath: parsed.PATIENT_API_ENDPOINT ?? "/Patient",
      nameParam: parsed.PATIENT_API_NAME_PARAM ?? "name",
      timeoutMs: parsed.PATIENT_API_TIMEOUT_MS ?? 30000,
      defaultLimit: parsed.PATIENT_API_DEFAULT_LIMIT ?? 10,
      auth: buildAuth(parsed),
    },
    aliasTable: loadAliasTable(parsed.FIELD_MAPPING_FILE ?? DEFAULT_FIELD_MAPPING_FILE),
    chat: {
      historyLimit: parsed.CHAT_HISTORY_LIMIT ?? 10,
      maxSessions: parsed.CHAT_MAX_SESSIONS ?? 1000,
    },
  };
}

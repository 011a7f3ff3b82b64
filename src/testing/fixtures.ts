import type { Server } from "http";
import type { AppConfig } from "../config/index.js";
import type { AliasTable } from "../mapping/types.js";
import type { PatientListQuery } from "../patient-api/client.js";
import type { PatientSource } from "../tools/patient-tools.js";

export const TEST_ALIAS_TABLE: AliasTable = {
  id: ["id", "patient_id", "PatientId"],
  name: ["name", "patient_name", "Name"],
  age: ["age", "Age"],
  diagnosis: ["diagnosis", "Diagnosis"],
  medications: ["medications", "Medications"],
  allergies: ["allergies", "Allergies"],
  lastUpdated: ["last_updated", "LastUpdated"],
  department: ["department"],
  status: ["status"],
  admitted: ["admission_date", "admitted"],
};

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    runMode: "http",
    patientApi: {
      baseUrl: "http://127.0.0.1:1/api",
      endpointPath: "/Patient",
      nameParam: "name",
      timeoutMs: 1000,
      defaultLimit: 10,
      auth: { type: "none" },
    },
    aliasTable: TEST_ALIAS_TABLE,
    chat: { historyLimit: 10, maxSessions: 100 },
    ...overrides,
  };
}

/**
 * In-memory stand-in for the patient directory. Records every query it gets.
 */
export class FakePatientSource implements PatientSource {
  readonly calls: PatientListQuery[] = [];

  constructor(private respond: (query: PatientListQuery) => Promise<unknown>) {}

  static returning(body: unknown): FakePatientSource {
    return new FakePatientSource(async () => body);
  }

  static failing(err: Error): FakePatientSource {
    return new FakePatientSource(async () => {
      throw err;
    });
  }

  respondWith(respond: (query: PatientListQuery) => Promise<unknown>): void {
    this.respond = respond;
  }

  async fetchPatients(query: PatientListQuery): Promise<unknown> {
    this.calls.push(query);
    return this.respond(query);
  }
}

/**
 * Starts `server` on an ephemeral loopback port and returns the port.
 */
export async function listenOnEphemeralPort(server: Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a TCP port");
  return address.port;
}

export function closeServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

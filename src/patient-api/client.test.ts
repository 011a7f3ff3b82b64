import { createServer, type IncomingHttpHeaders, type Server } from "http";
import { afterEach, describe, expect, it } from "vitest";
import type { AuthConfig, PatientApiConfig } from "../config/index.js";
import { MalformedResponseError, UpstreamStatusError, UpstreamUnreachableError } from "../errors.js";
import { createExampleDirectory } from "../../scripts/example-directory/app.js";
import { closeServer, listenOnEphemeralPort } from "../testing/fixtures.js";
import { clampLimit, PatientApiClient } from "./client.js";

type Seen = { url?: string; headers?: IncomingHttpHeaders };

let server: Server | undefined;

afterEach(async () => {
  if (!server) return;
  const current = server;
  server = undefined;
  await closeServer(current);
});

async function startDirectory(
  handler: (seen: Seen) => { status: number; body?: string } | "hang",
): Promise<{ port: number; seen: Seen }> {
  const seen: Seen = {};
  server = createServer((req, res) => {
    seen.url = req.url;
    seen.headers = req.headers;
    const reply = handler(seen);
    if (reply === "hang") return;
    res.writeHead(reply.status, { "content-type": "application/json" });
    res.end(reply.body ?? "");
  });
  const port = await listenOnEphemeralPort(server);
  return { port, seen };
}

function clientFor(port: number, overrides: { auth?: AuthConfig; timeoutMs?: number } = {}): PatientApiClient {
  const config: PatientApiConfig = {
    baseUrl: `http://127.0.0.1:${port}/api`,
    endpointPath: "/Patient",
    nameParam: "name",
    timeoutMs: overrides.timeoutMs ?? 1000,
    defaultLimit: 10,
    auth: overrides.auth ?? { type: "none" },
  };
  return new PatientApiClient(config);
}

describe("clampLimit", () => {
  it("keeps limits between 1 and 100", () => {
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(-4)).toBe(1);
    expect(clampLimit(25)).toBe(25);
    expect(clampLimit(500)).toBe(100);
  });
});

describe("PatientApiClient", () => {
  it("sends the name filter, the limit and the bearer token", async () => {
    const body = { patients: [{ id: "P001", name: "John Smith" }] };
    const { port, seen } = await startDirectory(() => ({ status: 200, body: JSON.stringify(body) }));
    const client = clientFor(port, { auth: { type: "bearer", token: "test-secret" } });

    await expect(client.fetchPatients({ patientName: " Smith ", limit: 5 })).resolves.toEqual(body);
    expect(seen.url).toBe("/api/Patient?name=Smith&limit=5");
    expect(seen.headers?.authorization).toBe("Bearer test-secret");
  });

  it("reads patients from the example directory", async () => {
    server = createServer(createExampleDirectory());
    const port = await listenOnEphemeralPort(server);

    await expect(clientFor(port).fetchPatients({ patientName: "smith", limit: 1 })).resolves.toMatchObject({
      patients: [{ id: "P001", name: "John Smith" }],
      total: 1,
      filters: { name: "smith", limit: 1 },
    });
  });

  it("uses the default limit and omits a blank name", async () => {
    const { port, seen } = await startDirectory(() => ({ status: 200, body: "[]" }));
    await clientFor(port).fetchPatients({ patientName: "  " });
    expect(seen.url).toBe("/api/Patient?limit=10");
    expect(seen.headers?.authorization).toBeUndefined();
  });

  it("puts an API key under the configured header", async () => {
    const { port, seen } = await startDirectory(() => ({ status: 200, body: "[]" }));
    const client = clientFor(port, { auth: { type: "api_key", token: "test-secret", headerName: "X-Clinic-Key" } });
    await client.fetchPatients({ limit: 500 });
    expect(seen.headers?.["x-clinic-key"]).toBe("test-secret");
    expect(seen.url).toBe("/api/Patient?limit=100");
  });

  it("reports a non-success status", async () => {
    const { port } = await startDirectory(() => ({ status: 503, body: '{"error":"maintenance"}' }));
    const failure = clientFor(port).fetchPatients({});
    await expect(failure).rejects.toBeInstanceOf(UpstreamStatusError);
    await expect(failure).rejects.toMatchObject({ status: 503, bodyPreview: '{"error":"maintenance"}' });
  });

  it("reports a body that is not JSON", async () => {
    const { port } = await startDirectory(() => ({ status: 200, body: "<html>" }));
    await expect(clientFor(port).fetchPatients({})).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("returns null for an empty body", async () => {
    const { port } = await startDirectory(() => ({ status: 200 }));
    await expect(clientFor(port).fetchPatients({})).resolves.toBeNull();
  });

  it("gives up after the timeout", async () => {
    const { port } = await startDirectory(() => "hang");
    await expect(clientFor(port, { timeoutMs: 50 }).fetchPatients({})).rejects.toBeInstanceOf(UpstreamUnreachableError);
  });

  it("cuts off a response that keeps trickling in past the deadline", async () => {
    server = createServer((_req, res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.write("[");
      const drip = setInterval(() => res.write(" "), 20);
      res.on("close", () => clearInterval(drip));
    });
    const port = await listenOnEphemeralPort(server);

    const started = Date.now();
    await expect(clientFor(port, { timeoutMs: 200 }).fetchPatients({})).rejects.toBeInstanceOf(UpstreamUnreachableError);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("reports a refused connection as unreachable", async () => {
    const { port } = await startDirectory(() => ({ status: 200, body: "[]" }));
    if (server) await closeServer(server);
    server = undefined;

    await expect(clientFor(port).fetchPatients({})).rejects.toBeInstanceOf(UpstreamUnreachableError);
  });
});

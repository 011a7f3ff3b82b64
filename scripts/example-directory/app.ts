import { readFileSync } from "fs";
import express, { Request, Response } from "express";
import { fileURLToPath } from "url";
import { z } from "zod";

export const SAMPLE_PATIENTS_FILE = fileURLToPath(new URL("./patients.json", import.meta.url));

const DEFAULT_LIMIT = 10;

const samplePatientSchema = z.object({ id: z.string(), name: z.string() }).passthrough();

export type SamplePatient = z.infer<typeof samplePatientSchema>;

export function loadSamplePatients(path: string = SAMPLE_PATIENTS_FILE): SamplePatient[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return z.array(samplePatientSchema).parse(raw);
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function parseLimit(value: unknown): number {
  const text = queryString(value);
  return text !== undefined && /^[-+]?\d+$/.test(text) ? Number.parseInt(text, 10) : DEFAULT_LIMIT;
}

/**
 * Stand-in patient directory for local runs and tests. Serves
 * `GET /api/Patient?name=&limit=` as `{patients, total, filters}`.
 * The name filter is a case-insensitive substring match; `limit <= 0`
 * returns every match.
 */
export function createExampleDirectory(patients: readonly SamplePatient[] = loadSamplePatients()) {
  const app = express();

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      message: "Example patient directory",
      endpoints: {
        "/api/Patient": "GET - list patients, optional name and limit",
        "/patients/:id": "GET - one patient by id",
        "/health": "GET - health check",
      },
    });
  });

  app.get("/api/Patient", (req: Request, res: Response) => {
    const name = queryString(req.query.name);
    const limit = parseLimit(req.query.limit);

    let matches = name ? patients.filter((p) => p.name.toLowerCase().includes(name.toLowerCase())) : [...patients];
    if (limit > 0) matches = matches.slice(0, limit);

    res.status(200).json({
      patients: matches,
      total: matches.length,
      filters: { name: name ?? null, limit },
    });
  });

  app.get("/patients/:id", (req: Request, res: Response) => {
    const patient = patients.find((p) => p.id === req.params.id);
    if (!patient) {
      res.status(404).json({ error: "Patient not found" });
      return;
    }
    res.status(200).json(patient);
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "healthy", message: "Example patient directory is running" });
  });

  return app;
}

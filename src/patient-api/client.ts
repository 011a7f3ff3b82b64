import https from "https";
import http from "http";
import { URL } from "url";
import type { PatientApiConfig } from "../config/index.js";
import { MalformedResponseError, UpstreamStatusError, UpstreamUnreachableError } from "../errors.js";
import { logger } from "../observability/logger.js";
import { patientApiRequestsTotal } from "../observability/metrics.js";

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;

export type PatientListQuery = {
  patientName?: string;
  limit?: number;
};

export function clampLimit(limit: number): number {
  return Math.min(Math.max(Math.trunc(limit), MIN_LIMIT), MAX_LIMIT);
}

function failureOutcome(err: unknown): string {
  if (err instanceof UpstreamStatusError) return "status_error";
  if (err instanceof MalformedResponseError) return "malformed";
  return "unreachable";
}

/**
 * Single GET against the patient directory. No retries: a socket error, or no
 * complete response within `timeoutMs`, surfaces as
 * {@link UpstreamUnreachableError} straight away.
 */
export class PatientApiClient {
  private readonly headers: Record<string, string>;

  constructor(private readonly config: PatientApiConfig) {
    this.headers = { accept: "application/json", ...this.authHeaders() };
  }

  private authHeaders(): Record<string, string> {
    const { auth } = this.config;
    switch (auth.type) {
      case "bearer":
        return { authorization: `Bearer ${auth.token}` };
      case "api_key":
        return { [auth.headerName.toLowerCase()]: auth.token };
      case "basic": {
        const token = Buffer.from(`${auth.username}:${auth.password}`).toString("base64");
        return { authorization: `Basic ${token}` };
      }
      case "none":
        return {};
    }
  }

  buildUrl(query: PatientListQuery): URL {
    const url = new URL(`${this.config.baseUrl}${this.config.endpointPath}`);
    const name = query.patientName?.trim();
    if (name) url.searchParams.set(this.config.nameParam, name);
    url.searchParams.set("limit", String(clampLimit(query.limit ?? this.config.defaultLimit)));
    return url;
  }

  /**
   * Returns the parsed JSON body of a 2xx response, whatever its shape.
   */
  async fetchPatients(query: PatientListQuery): Promise<unknown> {
    const url = this.buildUrl(query);
    const started = Date.now();
    try {
      const body = await this.get(url);
      patientApiRequestsTotal.inc({ outcome: "success" });
      logger.debug({ url: url.toString(), durationMs: Date.now() - started }, "patient directory request completed");
      return body;
    } catch (err) {
      const outcome = failureOutcome(err);
      patientApiRequestsTotal.inc({ outcome });
      logger.warn(
        { url: url.toString(), durationMs: Date.now() - started, outcome, error: err instanceof Error ? err.message : String(err) },
        "patient directory request failed",
      );
      throw err;
    }
  }

  private get(url: URL): Promise<unknown> {
    const isHttps = url.protocol === "https:";
    const httpModule = isHttps ? https : http;
    const fullUrl = `${url.origin}${url.pathname}`;

    return new Promise<unknown>((resolve, reject) => {
      const options = {
        hostname: url.hostname,
        port: url.port || (isHttps ? 443 : 80),
        path: url.pathname + url.search,
        method: "GET",
        headers: this.headers,
      };

      const req = httpModule.request(options, (res) => {
        let data = "";
        res.setEncoding("utf8");
        res.on("data", (chunk: string) => {
          data += chunk;
        });
        res.on("error", (err) => reject(new UpstreamUnreachableError(fullUrl, err)));
        res.on("end", () => {
          const status = res.statusCode ?? 500;
          if (status < 200 || status >= 300) {
            reject(new UpstreamStatusError(status, data.substring(0, 500)));
            return;
          }
          try {
            resolve(data ? JSON.parse(data) : null);
          } catch {
            reject(new MalformedResponseError("non-JSON body"));
          }
        });
      });

      // Total deadline: a response that keeps trickling in is cut off too
      const deadline = setTimeout(() => {
        const err = new Error(`timed out after ${this.config.timeoutMs}ms`);
        reject(new UpstreamUnreachableError(fullUrl, err));
        req.destroy(err);
      }, this.config.timeoutMs);
      req.on("close", () => clearTimeout(deadline));
      req.on("error", (err) => reject(new UpstreamUnreachableError(fullUrl, err)));
      req.end();
    });
  }
}

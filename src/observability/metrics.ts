import client from "prom-client";
import type { NextFunction, Request, Response } from "express";

client.collectDefaultMetrics();

export const httpRequestDurationSeconds = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "Duration of HTTP requests in seconds",
  labelNames: ["method", "route", "status_code"],
  buckets: [0.05, 0.1, 0.2, 0.5, 1, 2, 5],
});

export const chatMessagesTotal = new client.Counter({
  name: "chat_messages_total",
  help: "Chat messages handled, by routed intent and channel",
  labelNames: ["intent", "channel", "status"],
});

export const patientApiRequestsTotal = new client.Counter({
  name: "patient_api_requests_total",
  help: "Requests made to the upstream patient directory, by outcome",
  labelNames: ["outcome"],
});

export function requestTimer(req: Request, res: Response, next: NextFunction): void {
  const end = httpRequestDurationSeconds.startTimer({ method: req.method });
  res.on("finish", () => {
    end({ route: req.route?.path ?? req.path, status_code: res.statusCode });
  });
  next();
}

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.set("Content-Type", client.register.contentType);
  res.end(await client.register.metrics());
}

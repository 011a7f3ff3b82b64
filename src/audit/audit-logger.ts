import { logger } from "../observability/logger.js";

export type AccessChannel = "http" | "websocket" | "mcp";

export interface AccessContext {
  channel: AccessChannel;
  sessionId?: string;
}

export interface PatientLookupEvent {
  eventType: "patient_lookup";
  source: string;
  channel: AccessChannel;
  sessionId?: string;
  query: { patientName?: string; limit?: number };
  outcome: "success" | "no_match" | "error";
  resultCount: number;
  errorKind?: string;
  timestamp: string;
}

/**
 * Structured audit trail of who looked up patient data, through which channel.
 * Patient names in results are never logged, only the query and a count.
 */
export class AuditLogger {
  constructor(private readonly source = "patient-directory-chat-bridge") {}

  logPatientLookup(
    context: AccessContext,
    query: PatientLookupEvent["query"],
    result: { outcome: PatientLookupEvent["outcome"]; resultCount: number; errorKind?: string },
  ): PatientLookupEvent {
    const event: PatientLookupEvent = {
      eventType: "patient_lookup",
      source: this.source,
      channel: context.channel,
      sessionId: context.sessionId,
      query,
      outcome: result.outcome,
      resultCount: result.resultCount,
      errorKind: result.errorKind,
      timestamp: new Date().toISOString(),
    };

    if (result.outcome === "error") {
      logger.error({ event: "audit", ...event }, `Patient lookup failed: ${result.errorKind ?? "unknown"}`);
    } else {
      logger.info({ event: "audit", ...event }, `Patient lookup returned ${result.resultCount} record(s)`);
    }
    return event;
  }
}

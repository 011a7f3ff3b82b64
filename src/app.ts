import { AuditLogger } from "./audit/audit-logger.js";
import { ChatService } from "./chat/chat-service.js";
import type { AppConfig } from "./config/index.js";
import { PatientApiClient } from "./patient-api/client.js";
import { SessionStore } from "./session/session-store.js";
import { PatientTools, type PatientSource } from "./tools/patient-tools.js";

export interface AppContext {
  tools: PatientTools;
  sessions: SessionStore;
  chat: ChatService;
}

/**
 * Wires the collaborators from one config value. `source` replaces the HTTP
 * client, which tests use to run without an upstream.
 */
export function createAppContext(config: AppConfig, source: PatientSource = new PatientApiClient(config.patientApi)): AppContext {
  const tools = new PatientTools(source, config.aliasTable, config.patientApi.defaultLimit, new AuditLogger());
  const sessions = new SessionStore(config.chat.historyLimit, config.chat.maxSessions);
  const chat = new ChatService(tools, sessions);
  return { tools, sessions, chat };
}

import type { AccessChannel } from "../audit/audit-logger.js";
import { isPatientDirectoryError } from "../errors.js";
import { route } from "../intent/router.js";
import type { ConversationTurn, Intent } from "../intent/types.js";
import { logger } from "../observability/logger.js";
import { chatMessagesTotal } from "../observability/metrics.js";
import {
  render,
  renderError,
  renderGreeting,
  renderHelp,
  renderToolCatalog,
  renderUnknown,
} from "../presentation/presenter.js";
import type { SessionStore } from "../session/session-store.js";
import type { PatientTools } from "../tools/patient-tools.js";

export type ChatChannel = Extract<AccessChannel, "http" | "websocket">;

export type ChatResult =
  | { status: "success"; response: string; intent: Intent }
  | { status: "error"; error: string; intent: Intent };

export class ChatService {
  constructor(
    private readonly tools: PatientTools,
    private readonly sessions: SessionStore,
  ) {}

  /**
   * Routes one message and produces the reply. Turns are recorded only when a
   * reply was produced; an upstream failure leaves the session untouched.
   */
  async handleMessage(sessionId: string, message: string, channel: ChatChannel): Promise<ChatResult> {
    return this.sessions.runExclusive(sessionId, async () => {
      const intent = route(message, this.sessions.history(sessionId));
      const result = await this.reply(intent, sessionId, channel);
      chatMessagesTotal.inc({ intent: intent.kind, channel, status: result.status });

      if (result.status === "success") {
        const timestamp = new Date().toISOString();
        const userTurn: ConversationTurn = { role: "user", text: message, timestamp, intent };
        this.sessions.append(sessionId, userTurn);
        this.sessions.append(sessionId, { role: "assistant", text: result.response, timestamp });
      }
      return result;
    });
  }

  clearHistory(sessionId: string): Promise<void> {
    return this.sessions.runExclusive(sessionId, async () => {
      this.sessions.clear(sessionId);
    });
  }

  history(sessionId: string): ConversationTurn[] {
    return this.sessions.history(sessionId);
  }

  activeSessions(): number {
    return this.sessions.size();
  }

  private async reply(intent: Intent, sessionId: string, channel: ChatChannel): Promise<ChatResult> {
    switch (intent.kind) {
      case "greeting":
        return { status: "success", response: renderGreeting(intent.name), intent };
      case "help":
        return { status: "success", response: renderHelp(), intent };
      case "listTools":
        return { status: "success", response: renderToolCatalog(), intent };
      case "unknown":
        logger.debug({ sessionId, channel }, "utterance did not match any intent");
        return { status: "success", response: renderUnknown(intent.utterance), intent };
      case "getPatients":
        try {
          const { patients, query } = await this.tools.getPatientList(
            { patientName: intent.nameFilter, limit: intent.limit },
            { channel, sessionId },
          );
          return { status: "success", response: render(patients, query), intent };
        } catch (err) {
          if (!isPatientDirectoryError(err)) throw err;
          return { status: "error", error: renderError(err), intent };
        }
    }
  }
}

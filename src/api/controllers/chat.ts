import type { Request, Response } from "express";
import type { ChatService } from "../../chat/chat-service.js";
import { logger } from "../../observability/logger.js";
import { TOOL_CATALOG } from "../../tools/catalog.js";
import {
  chatRequestSchema,
  DEFAULT_SESSION_ID,
  SESSION_HEADER,
  type ChatResponse,
  type HistoryResponse,
  type StatusResponse,
} from "../types.js";

export class ChatController {
  constructor(private readonly chat: ChatService) {}

  /**
   * POST /api/chat
   * Body: { "message": "find patients named Smith", "sessionId"?: "abc" }
   */
  async chatMessage(req: Request, res: Response): Promise<void> {
    const parsed = chatRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const error = parsed.error.issues[0]?.message ?? "Invalid request";
      res.status(400).json({ status: "error", error } satisfies ChatResponse);
      return;
    }

    const sessionId = this.sessionIdFrom(req, parsed.data.sessionId);
    try {
      const result = await this.chat.handleMessage(sessionId, parsed.data.message, "http");
      if (result.status === "success") {
        res.status(200).json({ status: "success", response: result.response } satisfies ChatResponse);
      } else {
        // upstream lookup failed; the message was not recorded
        res.status(502).json({ status: "error", error: result.error } satisfies ChatResponse);
      }
    } catch (err) {
      this.handleError(res, err, sessionId);
    }
  }

  /**
   * POST /api/clear-chat
   */
  async clearChat(req: Request, res: Response): Promise<void> {
    const sessionId = this.sessionIdFrom(req, this.bodySessionId(req));
    try {
      await this.chat.clearHistory(sessionId);
      res.status(200).json({ status: "success", message: "Conversation history cleared" });
    } catch (err) {
      this.handleError(res, err, sessionId);
    }
  }

  /**
   * GET /api/history
   */
  history(req: Request, res: Response): void {
    const sessionId = this.sessionIdFrom(req, typeof req.query.sessionId === "string" ? req.query.sessionId : undefined);
    const turns = this.chat.history(sessionId).map(({ role, text, timestamp }) => ({ role, text, timestamp }));
    res.status(200).json({ status: "success", sessionId, turns } satisfies HistoryResponse);
  }

  /**
   * GET /api/status
   */
  status(_req: Request, res: Response): void {
    const body: StatusResponse = {
      status: "success",
      service: "patient-directory-chat-bridge",
      tools: TOOL_CATALOG.map((tool) => tool.name),
      activeSessions: this.chat.activeSessions(),
    };
    res.status(200).json(body);
  }

  private bodySessionId(req: Request): string | undefined {
    const body: unknown = req.body;
    if (typeof body !== "object" || body === null || !("sessionId" in body)) return undefined;
    return typeof body.sessionId === "string" ? body.sessionId : undefined;
  }

  private sessionIdFrom(req: Request, fromBody?: string): string {
    const header = req.header(SESSION_HEADER)?.trim();
    return header || fromBody?.trim() || DEFAULT_SESSION_ID;
  }

  private handleError(res: Response, err: unknown, sessionId: string): void {
    logger.error({ err, sessionId }, "[Chat] request failed");
    res.status(500).json({ status: "error", error: "Server error" } satisfies ChatResponse);
  }
}

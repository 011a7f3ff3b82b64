import { randomUUID } from "crypto";
import type { Server } from "http";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { z } from "zod";
import type { ChatService } from "../chat/chat-service.js";
import { logger } from "../observability/logger.js";

export const CHAT_SOCKET_PATH = "/ws";

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("chat_message"), message: z.string() }),
  z.object({ type: z.literal("clear_history") }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type ServerMessage =
  | { type: "status"; message: string; sessionId: string }
  | {
      type: "chat_response";
      status: "success" | "error";
      response?: string;
      error?: string;
      original_message?: string;
    }
  | { type: "history_cleared" };

function send(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function parseClientMessage(data: RawData): ClientMessage | undefined {
  try {
    const parsed = clientMessageSchema.safeParse(JSON.parse(data.toString()));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Realtime chat over WebSocket. Every connection gets its own session, which is
 * dropped when the socket closes.
 */
export class ChatSocketServer {
  private readonly wss: WebSocketServer;

  constructor(
    server: Server,
    private readonly chat: ChatService,
  ) {
    this.wss = new WebSocketServer({ server, path: CHAT_SOCKET_PATH });
    this.wss.on("connection", (ws) => this.onConnection(ws));
  }

  close(): Promise<void> {
    for (const client of this.wss.clients) client.terminate();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private onConnection(ws: WebSocket): void {
    const sessionId = `ws-${randomUUID()}`;
    logger.info({ sessionId }, "[ChatSocket] client connected");
    send(ws, { type: "status", message: "Connected to the patient directory assistant", sessionId });

    ws.on("message", (data) => {
      void this.onMessage(ws, sessionId, data);
    });
    ws.on("close", () => {
      logger.info({ sessionId }, "[ChatSocket] client disconnected");
      void this.chat.clearHistory(sessionId);
    });
    ws.on("error", (err) => {
      logger.warn({ sessionId, err }, "[ChatSocket] socket error");
    });
  }

  private async onMessage(ws: WebSocket, sessionId: string, data: RawData): Promise<void> {
    const message = parseClientMessage(data);
    if (!message) {
      send(ws, { type: "chat_response", status: "error", error: "Invalid message format" });
      return;
    }

    if (message.type === "clear_history") {
      await this.chat.clearHistory(sessionId);
      send(ws, { type: "history_cleared" });
      return;
    }

    const text = message.message.trim();
    if (!text) {
      send(ws, { type: "chat_response", status: "error", error: "Message cannot be empty" });
      return;
    }

    try {
      const result = await this.chat.handleMessage(sessionId, text, "websocket");
      if (result.status === "success") {
        send(ws, { type: "chat_response", status: "success", response: result.response, original_message: text });
      } else {
        send(ws, { type: "chat_response", status: "error", error: result.error, original_message: text });
      }
    } catch (err) {
      logger.error({ sessionId, err }, "[ChatSocket] message handling failed");
      send(ws, { type: "chat_response", status: "error", error: "Server error" });
    }
  }
}

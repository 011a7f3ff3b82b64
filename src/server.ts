import express, { NextFunction, Request, Response } from "express";
import { createChatRoutes } from "./api/routes/chat.js";
import type { ChatResponse } from "./api/types.js";
import type { ChatService } from "./chat/chat-service.js";
import { logger } from "./observability/logger.js";
import { metricsHandler, requestTimer } from "./observability/metrics.js";

function isJsonParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

export function createServer(chat: ChatService) {
  const app = express();
  app.use(express.json());
  app.use(requestTimer);

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok" });
  });

  app.get("/metrics", (req: Request, res: Response) => {
    void metricsHandler(req, res);
  });

  app.use("/api", createChatRoutes(chat));

  // Errors raised before a controller runs (body parsing) answer in the chat shape too
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isJsonParseError(err)) {
      res.status(400).json({ status: "error", error: "Invalid JSON body" } satisfies ChatResponse);
      return;
    }
    logger.error({ err, path: req.path }, "unhandled request error");
    res.status(500).json({ status: "error", error: "Server error" } satisfies ChatResponse);
  });

  return app;
}

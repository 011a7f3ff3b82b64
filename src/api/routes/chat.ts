import { Router } from "express";
import { ChatController } from "../controllers/chat.js";
import type { ChatService } from "../../chat/chat-service.js";

export function createChatRoutes(chat: ChatService): Router {
  const router = Router();
  const controller = new ChatController(chat);

  /**
   * Send a chat message
   * POST /api/chat  { "message": "show 5 patients" }
   */
  router.post("/chat", (req, res) => {
    void controller.chatMessage(req, res);
  });

  /**
   * Clear the caller's conversation history
   * POST /api/clear-chat
   */
  router.post("/clear-chat", (req, res) => {
    void controller.clearChat(req, res);
  });

  router.get("/history", (req, res) => {
    controller.history(req, res);
  });

  router.get("/status", (req, res) => {
    controller.status(req, res);
  });

  return router;
}

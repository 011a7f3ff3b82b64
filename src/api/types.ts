import { z } from "zod";

export const DEFAULT_SESSION_ID = "default";
export const SESSION_HEADER = "x-session-id";

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, "Message cannot be empty").max(2000),
  sessionId: z.string().trim().min(1).max(128).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export type ChatResponse =
  | { status: "success"; response: string }
  | { status: "error"; error: string };

export interface StatusResponse {
  status: "success";
  service: string;
  tools: string[];
  activeSessions: number;
}

export interface HistoryResponse {
  status: "success";
  sessionId: string;
  turns: Array<{ role: "user" | "assistant"; text: string; timestamp: string }>;
}

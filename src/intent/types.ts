export type Intent =
  | { kind: "listTools" }
  | { kind: "getPatients"; nameFilter?: string; limit?: number }
  | { kind: "greeting"; name?: string }
  | { kind: "help" }
  | { kind: "unknown"; utterance: string };

export type GetPatientsIntent = Extract<Intent, { kind: "getPatients" }>;

export type IntentKind = Intent["kind"];

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  role: TurnRole;
  text: string;
  timestamp: string; // ISO 8601
  intent?: Intent; // set on user turns once routed
}

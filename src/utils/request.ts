import { isPersonaName, type ConversationTurn, type PersonaName, type TurnSender } from "./types";

export type DetectRequest = {
  sessionId: string;
  message: ConversationTurn;
  history: ConversationTurn[];
  persona?: PersonaName;
  metadata?: Record<string, unknown>;
};

export type NormalizeResult = { ok: true; request: DetectRequest } | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toSender(value: unknown): TurnSender {
  const lower = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (lower === "scammer") return "scammer";
  if (lower === "user" || lower === "agent" || lower === "honeypot") return "user";
  return "unknown";
}

function toTimestamp(value: unknown, fallback: string): string {
  if (typeof value === "string" && value.trim()) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return fallback;
}

function toTurn(value: unknown, fallbackTimestamp: string): ConversationTurn | null {
  if (!isRecord(value) || typeof value.text !== "string") return null;
  return {
    sender: toSender(value.sender),
    text: value.text,
    timestamp: toTimestamp(value.timestamp, fallbackTimestamp)
  };
}

/** Message text from `message.text`, a flattened `text`, or a bare string `message`. */
export function messageText(body: Record<string, unknown>): string {
  const message = body.message;
  if (isRecord(message) && typeof message.text === "string") return message.text;
  if (typeof body.text === "string") return body.text;
  if (typeof message === "string") return message;
  return "";
}

export function normalizeRequest(body: unknown, now: string = new Date().toISOString()): NormalizeResult {
  const record = isRecord(body) ? body : {};
  const text = messageText(record);
  if (!text.trim()) {
    return { ok: false, error: "No message text provided" };
  }

  const rawMessage = isRecord(record.message) ? record.message : {};
  const message: ConversationTurn = {
    sender: toSender(rawMessage.sender ?? record.sender),
    text,
    timestamp: toTimestamp(rawMessage.timestamp ?? record.timestamp, now)
  };

  const rawHistory = Array.isArray(record.conversationHistory) ? record.conversationHistory : [];
  const history = rawHistory
    .map((turn) => toTurn(turn, now))
    .filter((turn): turn is ConversationTurn => turn !== null);

  const metadata = isRecord(record.metadata) ? record.metadata : undefined;
  const persona = metadata && isPersonaName(metadata.persona) ? metadata.persona : undefined;

  const sessionId =
    typeof record.sessionId === "string" && record.sessionId.trim() ? record.sessionId.trim() : `session-${Date.now()}`;

  return { ok: true, request: { sessionId, message, history, persona, metadata } };
}

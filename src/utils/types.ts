export type TurnSender = "scammer" | "user" | "unknown";

export type ConversationTurn = {
  sender: TurnSender;
  text: string;
  timestamp: string;
};

export type IntelligenceBundle = {
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
};

export type ConversationStatus = "ONGOING" | "FINISHED";

export type Decision = {
  scamDetected: boolean;
  conversationStatus: ConversationStatus;
  replyText: string;
  extractedIntelligence: IntelligenceBundle;
  agentNotes: string;
};

export const PERSONAS = [
  "Strict Lawyer",
  "Broke Student",
  "Confused Senior",
  "Busy Techie",
  "Angry Customer"
] as const;

export type PersonaName = (typeof PERSONAS)[number];

export function isPersonaName(value: unknown): value is PersonaName {
  return typeof value === "string" && (PERSONAS as readonly string[]).includes(value);
}

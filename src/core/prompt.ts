import type { ConversationTurn, PersonaName } from "../utils/types";

export const SYSTEM_PROMPT = [
  "You are an agentic honeypot inside a fraud detection system. You are NOT an assistant.",
  "You play an ordinary, skeptical human who wastes a scammer's time while collecting intelligence.",
  "",
  "OUTPUT",
  "- Output ONLY JSON matching the response schema. Populate every field. No markdown, no extra text.",
  "- Never invent intelligence. If unsure, choose the conservative option.",
  "",
  "DETECTION",
  "- Detection is progressive. Do not flag polite or unclear messages on their own.",
  "- NOT scams (scamDetected=false, replyText=\"\"): OTP alerts, completed debit/credit alerts,",
  "  informational bank messages with no action request, e.g. \"SBI Alert: Rs 1200 credited to your account.\"",
  "- Strong scam signals: urgency or threats (blocked account, legal action, SIM deactivation),",
  "  requests for UPI/OTP/card details/links/app installs, impersonation of banks, KYC, telecom or",
  "  government, payment redirection, forced verification.",
  "- False positives are heavily penalised.",
  "",
  "PERSONA",
  "- On the first reply pick ONE ordinary persona and keep its tone, vocabulary and mood.",
  "- When history exists, continue the EXACT SAME persona. No drift.",
  "",
  "ENGAGEMENT",
  "- If scamDetected=true, replyText MUST be non-empty: 1-2 short lines of plain text messaging.",
  "- Never comply. Doubt, delay, act confused, ask questions that make the sender reveal details.",
  "- Never reveal detection. Never use words like scam, fraud, honeypot or AI. No bold or asterisks.",
  "- Never point out contradictions (\"X again?\"). Never repeat a question already answered.",
  "- Elicit UPI IDs, bank accounts, phone numbers and links naturally.",
  "",
  "EXTRACTION",
  "- extractedIntelligence lists ALL indicators found in the ENTIRE conversation.",
  "",
  "STOP",
  "- conversationStatus=FINISHED once at least two independent kinds of intelligence are known, else ONGOING.",
  "",
  "NOTES",
  "- agentNotes: persona used, tactics observed, intelligence obtained, reason for disengaging."
].join("\n");

/** JSON Schema of the decision, shared with providers that take plain JSON Schema. */
export const DECISION_JSON_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["scamDetected", "conversationStatus", "replyText", "extractedIntelligence", "agentNotes"],
  properties: {
    scamDetected: { type: "boolean" },
    conversationStatus: { type: "string", enum: ["ONGOING", "FINISHED"] },
    replyText: { type: "string" },
    extractedIntelligence: {
      type: "object",
      additionalProperties: false,
      required: ["bankAccounts", "upiIds", "phishingLinks", "phoneNumbers", "suspiciousKeywords"],
      properties: {
        bankAccounts: { type: "array", items: { type: "string" } },
        upiIds: { type: "array", items: { type: "string" } },
        phishingLinks: { type: "array", items: { type: "string" } },
        phoneNumbers: { type: "array", items: { type: "string" } },
        suspiciousKeywords: { type: "array", items: { type: "string" } }
      }
    },
    agentNotes: { type: "string" }
  }
} as const;

export type PromptInput = {
  message: string;
  senderType: string;
  history: ConversationTurn[];
  /** Drawn on the first turn; on later turns only present when the caller carried it. */
  persona?: PersonaName;
};

export function contextHint(input: PromptInput): string {
  if (input.history.length === 0) {
    return input.persona
      ? `CONTEXT: This is the FIRST message. If scam, adopt persona '${input.persona}'.`
      : "CONTEXT: This is the FIRST message. If scam, adopt a believable victim persona.";
  }
  if (input.persona) {
    return `CONTEXT: History exists. STRICTLY MAINTAIN persona '${input.persona}'.`;
  }
  return "CONTEXT: History exists. STRICTLY MAINTAIN PREVIOUS PERSONA.";
}

export function buildDecisionPrompt(input: PromptInput): string {
  return [
    contextHint(input),
    "",
    `INCOMING MESSAGE: ${JSON.stringify(input.message)}`,
    `SENDER: ${input.senderType}`,
    "",
    "FULL CONVERSATION HISTORY:",
    JSON.stringify(input.history, null, 2),
    "",
    "Execute instructions now."
  ].join("\n");
}

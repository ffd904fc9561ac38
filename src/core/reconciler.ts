import {
  countIntelCategories,
  extractFromHistory,
  extractIndicators,
  mergeIntelligence,
  sanitizeIntelligence
} from "./extractor";
import type { RandomSource } from "./persona";
import { isDisallowedReply, pickFallbackReply, polishReply, type ReplyMemory } from "./replies";
import type { ConversationStatus, ConversationTurn, Decision, IntelligenceBundle } from "../utils/types";

export const DEFAULT_STOP_THRESHOLD = 2;

// Numeric (1800-266-0018, 18002586161) and vanity (1800-HDFC-NOW) forms; a bare amount such as
// "Rs 1800" or "1800 INR" is not a helpline.
const TOLL_FREE_REGEX = /(?<![\d.,])18(?:00|60)(?=[\s-]\d|\d{6,7}(?!\d)|[\s-](?!INR\b|RS\b|USD\b)[A-Z]{3,}\b)/;
const SHORT_MESSAGE_WORDS = 10;
const SHORT_MESSAGE_RISK_WORDS = ["blocked", "kyc", "pan", "upi", "verify"];

export type ReconcileInput = {
  message: string;
  history: ConversationTurn[];
  raw: Decision;
  memory: ReplyMemory;
  random: RandomSource;
  stopThreshold?: number;
};

export function hasTollFreeNumber(message: string): boolean {
  return TOLL_FREE_REGEX.test(message);
}

export function isShortNeutralFirstMessage(
  message: string,
  history: ConversationTurn[],
  intel: IntelligenceBundle
): boolean {
  if (history.length > 0 || intel.phishingLinks.length > 0) return false;
  const words = message.trim().split(/\s+/).filter(Boolean);
  if (words.length >= SHORT_MESSAGE_WORDS) return false;
  const lower = message.toLowerCase();
  return !SHORT_MESSAGE_RISK_WORDS.some((w) => lower.includes(w));
}

/** Two or more of the four hard indicator kinds ends the conversation; keywords never count. */
export function deriveConversationStatus(
  intel: IntelligenceBundle,
  threshold: number = DEFAULT_STOP_THRESHOLD
): ConversationStatus {
  return countIntelCategories(intel) >= threshold ? "FINISHED" : "ONGOING";
}

export function collectIntelligence(
  message: string,
  history: ConversationTurn[],
  modelIntel: IntelligenceBundle = mergeIntelligence()
): IntelligenceBundle {
  const known = mergeIntelligence(extractFromHistory(history), sanitizeIntelligence(modelIntel));
  return mergeIntelligence(known, extractIndicators(message, known));
}

function joinNotes(...parts: string[]): string {
  return parts.filter((p) => p.trim().length > 0).join(" | ");
}

export function reconcileDecision(input: ReconcileInput): Decision {
  const { message, history, raw, memory, random } = input;
  const notes: string[] = [];

  const extractedIntelligence = collectIntelligence(message, history, raw.extractedIntelligence);

  let scamDetected = raw.scamDetected;
  if (scamDetected && hasTollFreeNumber(message)) {
    scamDetected = false;
    notes.push("HARD RULE: toll-free number detected, safe mode enforced");
  }
  if (scamDetected && isShortNeutralFirstMessage(message, history, extractedIntelligence)) {
    scamDetected = false;
    notes.push("HARD RULE: short neutral first message (likely wrong number), safe mode enforced");
  }

  let replyText = "";
  if (scamDetected) {
    replyText = raw.replyText.trim();
    if (!replyText || isDisallowedReply(replyText)) {
      replyText = pickFallbackReply(message, memory, random);
      notes.push("reply replaced by contextual fallback");
    }
  } else {
    notes.push("safe message, silence enforced");
  }

  const threshold = input.stopThreshold ?? DEFAULT_STOP_THRESHOLD;
  const conversationStatus = deriveConversationStatus(extractedIntelligence, threshold);
  if (conversationStatus !== raw.conversationStatus) {
    notes.push(`status ${raw.conversationStatus} -> ${conversationStatus} (intel_count=${countIntelCategories(extractedIntelligence)})`);
  }

  if (scamDetected) {
    replyText = polishReply(replyText, message, memory, random);
  }

  return {
    scamDetected,
    conversationStatus,
    replyText,
    extractedIntelligence,
    agentNotes: joinNotes(...notes, raw.agentNotes)
  };
}

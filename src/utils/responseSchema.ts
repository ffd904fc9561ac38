import type { ConversationStatus, IntelligenceBundle, PersonaName } from "./types";

/** Synthetic per-turn estimate; engagement time is not measured. */
export const SECONDS_PER_MESSAGE = 15;

export type EngagementMetrics = {
  engagementDurationSeconds: number;
  totalMessagesExchanged: number;
};

export type DetectResponse = {
  status: "success";
  scamDetected: boolean;
  reply: string;
  conversationStatus: ConversationStatus;
  engagementMetrics: EngagementMetrics;
  extractedIntelligence: IntelligenceBundle;
  agentNotes: string;
  /** Echoed so the caller can pass it back as `metadata.persona` on the next turn. */
  persona?: PersonaName;
};

export type ErrorResponse = {
  status: "error";
  message: string;
};

export function engagementFor(totalMessagesExchanged: number): EngagementMetrics {
  return {
    engagementDurationSeconds: totalMessagesExchanged * SECONDS_PER_MESSAGE,
    totalMessagesExchanged
  };
}

export function makeDetectResponse(args: Partial<DetectResponse> = {}): DetectResponse {
  const base: DetectResponse = {
    status: "success",
    scamDetected: false,
    reply: "",
    conversationStatus: "ONGOING",
    engagementMetrics: engagementFor(0),
    extractedIntelligence: {
      bankAccounts: [],
      upiIds: [],
      phishingLinks: [],
      phoneNumbers: [],
      suspiciousKeywords: []
    },
    agentNotes: ""
  };

  return {
    ...base,
    ...args,
    engagementMetrics: {
      ...base.engagementMetrics,
      ...(args.engagementMetrics || {})
    },
    extractedIntelligence: {
      ...base.extractedIntelligence,
      ...(args.extractedIntelligence || {})
    }
  };
}

export function makeErrorResponse(message: string): ErrorResponse {
  return { status: "error", message };
}

import { emptyIntelligence } from "./extractor";
import { pickPersona, type RandomSource } from "./persona";
import { checkLegitimacy } from "./prefilter";
import { collectIntelligence, deriveConversationStatus, reconcileDecision, DEFAULT_STOP_THRESHOLD } from "./reconciler";
import { pickFallbackReply, polishReply, ReplyMemory } from "./replies";
import type { DecisionRequester } from "./requester";
import type { ConversationTurn, Decision, PersonaName } from "../utils/types";
import { describeError, safeError, safeLog } from "../utils/logging";

export type AgentInput = {
  message: string;
  history: ConversationTurn[];
  senderType: string;
  /** Persona the caller carried over from an earlier turn. */
  persona?: PersonaName;
};

export type DecisionSource = "prefilter" | "model" | "fallback";

export type AgentResult = {
  decision: Decision;
  source: DecisionSource;
  /** Known when drawn on the first turn or carried by the caller; otherwise left to the history. */
  persona?: PersonaName;
};

export type AgentOptions = {
  requester: DecisionRequester | null;
  stopThreshold?: number;
  random?: RandomSource;
  memory?: ReplyMemory;
};

export const PREFILTER_NOTE = "Pre-filter: certainly legitimate first message, model call skipped.";

export class HoneypotAgent {
  private readonly requester: DecisionRequester | null;
  private readonly stopThreshold: number;
  private readonly random: RandomSource;
  private readonly memory: ReplyMemory;

  constructor(options: AgentOptions) {
    this.requester = options.requester;
    this.stopThreshold = options.stopThreshold ?? DEFAULT_STOP_THRESHOLD;
    this.random = options.random ?? Math.random;
    this.memory = options.memory ?? new ReplyMemory(8);
  }

  async processMessage(input: AgentInput): Promise<AgentResult> {
    const firstTurn = input.history.length === 0;

    if (firstTurn) {
      const verdict = checkLegitimacy(input.message);
      if (verdict.legitimate) {
        safeLog(`[AGENT] pre-filter short-circuit: ${verdict.reason}${verdict.matched ? ` (${verdict.matched})` : ""}`);
        return {
          decision: {
            scamDetected: false,
            conversationStatus: "ONGOING",
            replyText: "",
            extractedIntelligence: emptyIntelligence(),
            agentNotes: `${PREFILTER_NOTE} rule=${verdict.reason}`
          },
          source: "prefilter"
        };
      }
    }

    const persona = input.persona ?? (firstTurn ? pickPersona(this.random) : undefined);

    if (!this.requester) {
      return { decision: this.fallbackDecision(input, "no decision service configured"), source: "fallback", persona };
    }

    try {
      const raw = await this.requester.request({
        message: input.message,
        senderType: input.senderType,
        history: input.history,
        persona
      });
      const decision = reconcileDecision({
        message: input.message,
        history: input.history,
        raw,
        memory: this.memory,
        random: this.random,
        stopThreshold: this.stopThreshold
      });
      if (persona) decision.agentNotes = `persona=${persona} | ${decision.agentNotes}`;
      safeLog(
        `[AGENT] scamDetected=${decision.scamDetected} status=${decision.conversationStatus} reply=${decision.replyText}`
      );
      return { decision, source: "model", persona };
    } catch (err) {
      safeError(`[AGENT] decision service unavailable: ${describeError(err)}`);
      return { decision: this.fallbackDecision(input, "decision service unavailable"), source: "fallback", persona };
    }
  }

  /**
   * Conservative decision when the model path fails. A conversation already under way is
   * treated as a suspected scam; a bare first message is not.
   */
  fallbackDecision(input: AgentInput, cause: string): Decision {
    const scamDetected = input.history.length > 0;
    const extractedIntelligence = collectIntelligence(input.message, input.history);
    const replyText = scamDetected
      ? polishReply(pickFallbackReply(input.message, this.memory, this.random), input.message, this.memory, this.random)
      : "";
    return {
      scamDetected,
      conversationStatus: deriveConversationStatus(extractedIntelligence, this.stopThreshold),
      replyText,
      extractedIntelligence,
      agentNotes: `Fallback (${cause}): ${
        scamDetected ? "continuing suspected scam with a stalling reply" : "first message left unflagged"
      }; intelligence from deterministic extraction only.`
    };
  }
}

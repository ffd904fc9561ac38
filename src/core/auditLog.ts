import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { DecisionSource } from "./agent";
import type { Decision, PersonaName } from "../utils/types";
import { describeError, safeWarn } from "../utils/logging";

export type AuditEntry = {
  sessionId: string;
  turnIndex: number;
  source: DecisionSource;
  persona?: PersonaName;
  decision: Decision;
};

export interface DecisionAuditLog {
  record(entry: AuditEntry): Promise<void>;
}

/** Write-only decision trail; nothing in the request path ever reads it back. */
export class SupabaseAuditLog implements DecisionAuditLog {
  private readonly client: SupabaseClient;

  constructor(url: string, serviceRoleKey: string) {
    this.client = createClient(url, serviceRoleKey, { auth: { persistSession: false, autoRefreshToken: false } });
  }

  async record(entry: AuditEntry): Promise<void> {
    try {
      const { error } = await this.client.from("honeypot_decisions").insert({
        session_id: entry.sessionId,
        turn_index: entry.turnIndex,
        source: entry.source,
        persona: entry.persona ?? null,
        scam_detected: entry.decision.scamDetected,
        conversation_status: entry.decision.conversationStatus,
        reply: entry.decision.replyText,
        extracted_intel: entry.decision.extractedIntelligence,
        agent_notes: entry.decision.agentNotes
      });
      if (error) safeWarn(`[AUDIT] insert failed: ${error.message}`);
    } catch (err) {
      safeWarn(`[AUDIT] insert failed: ${describeError(err)}`);
    }
  }
}

export function createAuditLog(config: {
  url: string;
  serviceRoleKey: string;
  logEnabled: boolean;
}): DecisionAuditLog | null {
  if (!config.logEnabled || !config.url || !config.serviceRoleKey) return null;
  return new SupabaseAuditLog(config.url, config.serviceRoleKey);
}

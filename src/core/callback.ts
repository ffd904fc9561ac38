import axios from "axios";
import type { IntelligenceBundle } from "../utils/types";
import { describeError, safeError, safeLog, safeStringify, safeWarn } from "../utils/logging";

export type FinalCallbackPayload = {
  sessionId: string;
  scamDetected: boolean;
  totalMessagesExchanged: number;
  extractedIntelligence: IntelligenceBundle;
  agentNotes: string;
};

export type CallbackPoster = (
  url: string,
  payload: FinalCallbackPayload,
  options: { timeoutMs: number; headers: Record<string, string> }
) => Promise<{ status: number }>;

export type CallbackOptions = {
  url: string;
  timeoutMs: number;
  maxAttempts: number;
  apiKey?: string;
  post?: CallbackPoster;
  /** How many reported sessions to remember for one-shot delivery. */
  memorySize?: number;
};

export type CallbackResult = { ok: boolean; attempts: number; status?: number; skipped?: boolean };

const axiosPoster: CallbackPoster = async (url, payload, options) => {
  const response = await axios.post(url, payload, {
    timeout: options.timeoutMs,
    headers: options.headers,
    validateStatus: () => true
  });
  return { status: response.status };
};

export function buildCallbackPayload(
  sessionId: string,
  scamDetected: boolean,
  totalMessagesExchanged: number,
  extracted: IntelligenceBundle,
  agentNotes: string
): FinalCallbackPayload {
  return {
    sessionId,
    scamDetected,
    totalMessagesExchanged,
    extractedIntelligence: {
      bankAccounts: extracted.bankAccounts,
      upiIds: extracted.upiIds,
      phishingLinks: extracted.phishingLinks,
      phoneNumbers: extracted.phoneNumbers,
      suspiciousKeywords: extracted.suspiciousKeywords
    },
    agentNotes
  };
}

export class CallbackDispatcher {
  private readonly post: CallbackPoster;
  private readonly reported: string[] = [];
  private readonly memorySize: number;

  constructor(private readonly options: CallbackOptions) {
    this.post = options.post ?? axiosPoster;
    this.memorySize = options.memorySize ?? 1000;
  }

  hasReported(sessionId: string): boolean {
    return this.reported.includes(sessionId);
  }

  private markReported(sessionId: string): void {
    this.reported.push(sessionId);
    while (this.reported.length > this.memorySize) this.reported.shift();
  }

  /** Never rejects: delivery failures are logged and dropped. */
  async send(payload: FinalCallbackPayload): Promise<CallbackResult> {
    if (this.hasReported(payload.sessionId)) {
      safeLog(`[CALLBACK] session=${payload.sessionId} already reported, skipping`);
      return { ok: true, attempts: 0, skipped: true };
    }
    this.markReported(payload.sessionId);

    safeLog(`[CALLBACK] session=${payload.sessionId} payload: ${safeStringify(payload, 2000)}`);
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers["x-api-key"] = this.options.apiKey;

    let lastStatus: number | undefined;
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const response = await this.post(this.options.url, payload, { timeoutMs: this.options.timeoutMs, headers });
        lastStatus = response.status;
        if (response.status === 200 || response.status === 201) {
          safeLog(`[CALLBACK] session=${payload.sessionId} delivered (status ${response.status})`);
          return { ok: true, attempts: attempt, status: response.status };
        }
        safeWarn(`[CALLBACK] attempt ${attempt}/${maxAttempts} got status ${response.status}`);
      } catch (err) {
        safeWarn(`[CALLBACK] attempt ${attempt}/${maxAttempts} failed: ${describeError(err)}`);
      }
    }

    safeError(`[CALLBACK] session=${payload.sessionId} failed after ${maxAttempts} attempts`);
    return { ok: false, attempts: maxAttempts, status: lastStatus };
  }
}

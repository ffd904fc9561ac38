import { emptyIntelligence } from "./extractor";
import { buildDecisionPrompt, SYSTEM_PROMPT, type PromptInput } from "./prompt";
import type { ConversationStatus, Decision, IntelligenceBundle } from "../utils/types";
import { describeError, maskDigits, safeLog, safeWarn, truncate } from "../utils/logging";

export type DecisionCall = {
  systemPrompt: string;
  prompt: string;
  maxOutputTokens: number;
  signal: AbortSignal;
};

/** What a provider hands back: a typed object when it has one, always the raw text. */
export type ModelOutput = {
  parsed?: unknown;
  text: string;
};

export interface DecisionClient {
  readonly name: string;
  generate(call: DecisionCall): Promise<ModelOutput>;
}

export class DecisionServiceError extends Error {
  readonly rateLimited: boolean;
  readonly attempts: number;

  constructor(message: string, options: { cause?: unknown; rateLimited?: boolean; attempts?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = "DecisionServiceError";
    this.rateLimited = options.rateLimited ?? false;
    this.attempts = options.attempts ?? 1;
  }
}

export class MalformedDecisionError extends Error {
  readonly raw: string;

  constructor(raw: string) {
    super("Model output does not match the decision schema");
    this.name = "MalformedDecisionError";
    this.raw = raw;
  }
}

export type RequesterOptions = {
  timeoutMs: number;
  maxOutputTokens: number;
  maxAttempts: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeArray(values: unknown): string[] {
  if (!Array.isArray(values)) return [];
  return values
    .filter((v): v is string | number => typeof v === "string" || typeof v === "number")
    .map((v) => String(v).trim())
    .filter(Boolean);
}

function normalizeIntel(value: unknown): IntelligenceBundle {
  if (!isRecord(value)) return emptyIntelligence();
  return {
    bankAccounts: normalizeArray(value.bankAccounts),
    upiIds: normalizeArray(value.upiIds),
    phishingLinks: normalizeArray(value.phishingLinks),
    phoneNumbers: normalizeArray(value.phoneNumbers),
    suspiciousKeywords: normalizeArray(value.suspiciousKeywords)
  };
}

/**
 * Validates a candidate decision. `scamDetected` is the only field without a safe default;
 * everything else is coerced.
 */
export function coerceDecision(value: unknown): Decision | null {
  if (!isRecord(value) || typeof value.scamDetected !== "boolean") return null;
  const status: ConversationStatus = value.conversationStatus === "FINISHED" ? "FINISHED" : "ONGOING";
  return {
    scamDetected: value.scamDetected,
    conversationStatus: status,
    replyText: typeof value.replyText === "string" ? value.replyText.trim() : "",
    extractedIntelligence: normalizeIntel(value.extractedIntelligence),
    agentNotes: typeof value.agentNotes === "string" ? value.agentNotes.trim() : ""
  };
}

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/);
  return fenced ? fenced[1].trim() : trimmed;
}

/** JSON.parse that yields undefined for non-JSON text; providers use it to fill `parsed`. */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractJson(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) return undefined;
  return tryParseJson(text.slice(start, end + 1));
}

export function parseDecision(output: ModelOutput): Decision {
  const direct = coerceDecision(output.parsed);
  if (direct) return direct;

  const unfenced = stripCodeFence(output.text || "");
  const decision = coerceDecision(tryParseJson(unfenced)) ?? coerceDecision(extractJson(unfenced));
  if (!decision) {
    throw new MalformedDecisionError(output.text || "");
  }
  return decision;
}

function readStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

export function isRateLimitError(err: unknown): boolean {
  if (readStatus(err) === 429) return true;
  const message = err instanceof Error ? err.message : String(err);
  return /\b429\b|RESOURCE_EXHAUSTED|rate limit/i.test(message);
}

async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`Decision service timeout after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class DecisionRequester {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly client: DecisionClient,
    private readonly options: RequesterOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async request(input: PromptInput): Promise<Decision> {
    safeLog(`[AGENT] ${this.client.name} thinking on: ${maskDigits(truncate(input.message, 50))}`);
    const call = {
      systemPrompt: SYSTEM_PROMPT,
      prompt: buildDecisionPrompt(input),
      maxOutputTokens: this.options.maxOutputTokens
    };

    const maxAttempts = Math.max(1, this.options.maxAttempts);
    for (let attempt = 1; ; attempt += 1) {
      let output: ModelOutput;
      try {
        output = await withTimeout((signal) => this.client.generate({ ...call, signal }), this.options.timeoutMs);
      } catch (err) {
        const rateLimited = isRateLimitError(err);
        if (rateLimited && attempt < maxAttempts) {
          const waitMs = this.options.backoffMs * attempt;
          safeWarn(`[AGENT] rate limited (attempt ${attempt}/${maxAttempts}), retrying in ${waitMs}ms`);
          await this.sleep(waitMs);
          continue;
        }
        throw new DecisionServiceError(
          rateLimited ? "Decision service rate limited, retries exhausted" : `Decision service failed: ${describeError(err)}`,
          { cause: err, rateLimited, attempts: attempt }
        );
      }
      // Malformed output is not retried.
      return parseDecision(output);
    }
  }
}

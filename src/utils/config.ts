export type DecisionProvider = "gemini" | "openai";

export type AppConfig = {
  port: number;
  apiSecret: string;
  provider: DecisionProvider;
  gemini: { apiKey: string; model: string };
  openai: { apiKey: string; model: string };
  decision: {
    timeoutMs: number;
    maxOutputTokens: number;
    maxAttempts: number;
    backoffMs: number;
  };
  stopIntelThreshold: number;
  callback: { url: string; timeoutMs: number; maxAttempts: number };
  supabase: { url: string; serviceRoleKey: string; logEnabled: boolean };
};

export const DEFAULT_CALLBACK_URL = "https://hackathon.guvi.in/api/updateHoneyPotFinalResult";

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string, fallback: string): string {
  return env[key] || fallback;
}

function optionalInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

function parseProvider(raw: string | undefined): DecisionProvider {
  return raw?.toLowerCase() === "openai" ? "openai" : "gemini";
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: optionalInt(env, "PORT", 3000),
    apiSecret: optional(env, "API_SECRET", ""),
    provider: parseProvider(env.DECISION_PROVIDER),
    gemini: {
      apiKey: env.GEMINI_API_KEY || env.GOOGLE_API_KEY || "",
      model: optional(env, "GEMINI_MODEL", "gemini-2.0-flash")
    },
    openai: {
      apiKey: optional(env, "OPENAI_API_KEY", ""),
      model: optional(env, "OPENAI_MODEL", "gpt-4o-mini")
    },
    decision: {
      timeoutMs: optionalInt(env, "DECISION_TIMEOUT_MS", 15000),
      maxOutputTokens: optionalInt(env, "DECISION_MAX_OUTPUT_TOKENS", 1024),
      maxAttempts: Math.max(1, optionalInt(env, "DECISION_MAX_ATTEMPTS", 3)),
      backoffMs: optionalInt(env, "DECISION_BACKOFF_MS", 2000)
    },
    stopIntelThreshold: Math.max(1, optionalInt(env, "STOP_INTEL_THRESHOLD", 2)),
    callback: {
      url: optional(env, "CALLBACK_URL", DEFAULT_CALLBACK_URL),
      timeoutMs: optionalInt(env, "CALLBACK_TIMEOUT_MS", 5000),
      maxAttempts: Math.max(1, optionalInt(env, "CALLBACK_MAX_ATTEMPTS", 3))
    },
    supabase: {
      url: optional(env, "SUPABASE_URL", ""),
      serviceRoleKey: optional(env, "SUPABASE_SERVICE_ROLE_KEY", ""),
      logEnabled: env.ENABLE_SUPABASE_LOG !== "false"
    }
  };
}

import express, { type Request, type Response } from "express";
import dotenv from "dotenv";
import cors from "cors";
import { HoneypotAgent } from "./core/agent";
import { createAuditLog } from "./core/auditLog";
import { CallbackDispatcher } from "./core/callback";
import { GeminiDecisionClient } from "./core/providers/geminiClient";
import { OpenAIDecisionClient } from "./core/providers/openaiClient";
import { DecisionRequester, type DecisionClient } from "./core/requester";
import { createHoneypotRouter, type HoneypotDeps } from "./routes/honeypot";
import { loadConfig, type AppConfig } from "./utils/config";
import { describeError, safeLog, safeWarn } from "./utils/logging";

function createDecisionClient(config: AppConfig): DecisionClient | null {
  try {
    return config.provider === "openai"
      ? new OpenAIDecisionClient(config.openai.apiKey, config.openai.model)
      : new GeminiDecisionClient(config.gemini.apiKey, config.gemini.model);
  } catch (err) {
    safeWarn(`[BOOT] ${config.provider} decision client unavailable, using fallback decisions: ${describeError(err)}`);
    return null;
  }
}

export function createDeps(config: AppConfig): HoneypotDeps {
  const client = createDecisionClient(config);
  const requester = client ? new DecisionRequester(client, config.decision) : null;
  if (!config.apiSecret) {
    safeWarn("[BOOT] API_SECRET not set, x-api-key authentication is disabled");
  }
  return {
    agent: new HoneypotAgent({ requester, stopThreshold: config.stopIntelThreshold }),
    callbacks: new CallbackDispatcher({ ...config.callback, apiKey: config.apiSecret || undefined }),
    apiSecret: config.apiSecret,
    auditLog: createAuditLog(config.supabase)
  };
}

export function createApp(deps: HoneypotDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ type: "*/*", limit: "2mb" }));

  app.use("/api", createHoneypotRouter(deps));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  return app;
}

if (require.main === module) {
  dotenv.config();
  const config = loadConfig();
  const app = createApp(createDeps(config));
  app.listen(config.port, () => {
    safeLog(`HoneyPot API listening on port ${config.port} (provider=${config.provider})`);
  });
}

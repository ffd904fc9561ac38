import { Router, type NextFunction, type Request, type Response } from "express";
import type { HoneypotAgent } from "../core/agent";
import type { AuditEntry, DecisionAuditLog } from "../core/auditLog";
import { buildCallbackPayload, type CallbackDispatcher, type FinalCallbackPayload } from "../core/callback";
import { collectIntelligence } from "../core/reconciler";
import { normalizeRequest } from "../utils/request";
import {
  engagementFor,
  makeDetectResponse,
  makeErrorResponse,
  type DetectResponse,
  type ErrorResponse
} from "../utils/responseSchema";
import { describeError, maskDigits, safeError, safeLog, safeStringify, sanitizeHeaders } from "../utils/logging";

export type HoneypotDeps = {
  agent: HoneypotAgent;
  callbacks: CallbackDispatcher;
  apiSecret: string;
  auditLog?: DecisionAuditLog | null;
};

export type DetectOutcome = {
  status: number;
  body: DetectResponse | ErrorResponse;
  /** Report to deliver after the response has gone out. */
  callback?: FinalCallbackPayload;
  audit?: AuditEntry;
};

export function isAuthorized(apiKey: string | undefined, apiSecret: string): boolean {
  if (!apiSecret) return true;
  return apiKey === apiSecret;
}

export async function handleDetect(
  body: unknown,
  apiKey: string | undefined,
  deps: HoneypotDeps
): Promise<DetectOutcome> {
  if (!isAuthorized(apiKey, deps.apiSecret)) {
    return { status: 401, body: makeErrorResponse("Invalid API key") };
  }

  const normalized = normalizeRequest(body);
  if (!normalized.ok) {
    return { status: 400, body: makeErrorResponse(normalized.error) };
  }

  const { sessionId, message, history, persona } = normalized.request;
  const totalMessagesExchanged = history.length + 1;
  safeLog(`[SCAMMER] session=${sessionId} ${maskDigits(message.text)}`);

  try {
    const result = await deps.agent.processMessage({
      message: message.text,
      history,
      senderType: message.sender,
      persona
    });
    const { decision } = result;
    if (decision.replyText) safeLog(`[HONEYPOT] session=${sessionId} ${maskDigits(decision.replyText)}`);

    const responseBody = makeDetectResponse({
      scamDetected: decision.scamDetected,
      reply: decision.replyText,
      conversationStatus: decision.conversationStatus,
      engagementMetrics: engagementFor(totalMessagesExchanged),
      extractedIntelligence: decision.extractedIntelligence,
      agentNotes: decision.agentNotes,
      ...(result.persona && decision.scamDetected ? { persona: result.persona } : {})
    });

    const callback =
      decision.conversationStatus === "FINISHED"
        ? buildCallbackPayload(
            sessionId,
            decision.scamDetected,
            totalMessagesExchanged,
            decision.extractedIntelligence,
            decision.agentNotes
          )
        : undefined;

    return {
      status: 200,
      body: responseBody,
      callback,
      audit: {
        sessionId,
        turnIndex: totalMessagesExchanged,
        source: result.source,
        persona: result.persona,
        decision
      }
    };
  } catch (err) {
    safeError(`[HONEYPOT] internal error: ${describeError(err)}`);
    const scamDetected = history.length > 0;
    return {
      status: 200,
      body: makeDetectResponse({
        scamDetected,
        reply: scamDetected ? "Sorry, I am a bit busy right now. I will check this and get back to you." : "",
        engagementMetrics: engagementFor(totalMessagesExchanged),
        extractedIntelligence: collectIntelligence(message.text, history),
        agentNotes: "fallback due to internal error"
      })
    };
  }
}

function logOutgoing(status: number, responseJson: unknown): void {
  safeLog(`[OUTGOING] status=${status} response_json: ${safeStringify(responseJson, 5000)}`);
}

export function createHoneypotRouter(deps: HoneypotDeps): Router {
  const router = Router();

  const detect = async (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    safeLog(`[INCOMING] headers: ${safeStringify(sanitizeHeaders(req.headers), 2000)}`);
    safeLog(`[INCOMING] body: ${safeStringify(body, 2000)}`);

    const outcome = await handleDetect(body, req.header("x-api-key"), deps);
    logOutgoing(outcome.status, outcome.body);
    res.status(outcome.status).json(outcome.body);

    if (outcome.callback) {
      safeLog(`[CALLBACK] FINISHED, scheduling report for session=${outcome.callback.sessionId}`);
      void deps.callbacks.send(outcome.callback);
    }
    if (outcome.audit && deps.auditLog) {
      void deps.auditLog.record(outcome.audit);
    }
  };

  const handler = (req: Request, res: Response, next: NextFunction) => {
    detect(req, res).catch(next);
  };

  router.post("/honeypot", handler);
  router.post("/v1/detect", handler);

  return router;
}

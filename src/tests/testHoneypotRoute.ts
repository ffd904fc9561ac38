import assert from "assert";
import axios from "axios";
import { once } from "events";
import type { Server } from "http";
import { after, before, describe, it } from "node:test";
import { HoneypotAgent } from "../core/agent";
import { CallbackDispatcher, type CallbackPoster } from "../core/callback";
import { handleDetect, isAuthorized, type HoneypotDeps } from "../routes/honeypot";
import { createApp } from "../server";
import type { DetectResponse, ErrorResponse } from "../utils/responseSchema";
import { ScriptedClient, decisionOutput, makeRequester, steadyRandom } from "./fakes";

function deps(client: ScriptedClient, apiSecret = "test-secret"): HoneypotDeps {
  return {
    agent: new HoneypotAgent({ requester: makeRequester(client), random: steadyRandom }),
    callbacks: new CallbackDispatcher({
      url: "https://callback.test/report",
      timeoutMs: 5000,
      maxAttempts: 3,
      post: async () => ({ status: 200 })
    }),
    apiSecret
  };
}

function success(body: DetectResponse | ErrorResponse): DetectResponse {
  assert.strictEqual(body.status, "success");
  if (body.status !== "success") throw new Error("expected success body");
  return body;
}

const scamReply = decisionOutput({ scamDetected: true, replyText: "Which branch is this from?" });

describe("handleDetect", () => {
  it("rejects a wrong api key", async () => {
    const outcome = await handleDetect({ text: "hi" }, "wrong", deps(new ScriptedClient([scamReply])));
    assert.strictEqual(outcome.status, 401);
    assert.deepStrictEqual(outcome.body, { status: "error", message: "Invalid API key" });
  });

  it("skips auth when no secret is configured", () => {
    assert.strictEqual(isAuthorized(undefined, ""), true);
    assert.strictEqual(isAuthorized(undefined, "test-secret"), false);
  });

  it("rejects a body without message text", async () => {
    const outcome = await handleDetect({ sessionId: "s1", message: { sender: "scammer" } }, "test-secret", deps(new ScriptedClient([scamReply])));
    assert.strictEqual(outcome.status, 400);
    assert.deepStrictEqual(outcome.body, { status: "error", message: "No message text provided" });
  });

  it("answers a legitimate alert with synthetic engagement metrics", async () => {
    const outcome = await handleDetect(
      {
        sessionId: "s-legit",
        message: { sender: "scammer", text: "SBI Alert: Rs 1200 credited to your account.", timestamp: "t1" },
        conversationHistory: []
      },
      "test-secret",
      deps(new ScriptedClient([scamReply]))
    );
    const body = success(outcome.body);
    assert.strictEqual(body.scamDetected, false);
    assert.strictEqual(body.reply, "");
    assert.deepStrictEqual(body.engagementMetrics, { engagementDurationSeconds: 15, totalMessagesExchanged: 1 });
    assert.strictEqual(outcome.callback, undefined);
  });

  it("accepts a flattened text field", async () => {
    const outcome = await handleDetect(
      { sessionId: "s-flat", text: "Your account will be blocked today! Update PAN immediately at http://bit.ly/hdfc-kyc" },
      "test-secret",
      deps(new ScriptedClient([scamReply]))
    );
    const body = success(outcome.body);
    assert.strictEqual(body.scamDetected, true);
    assert.strictEqual(body.reply, "Which branch is this from?");
    assert.deepStrictEqual(body.extractedIntelligence.phishingLinks, ["http://bit.ly/hdfc-kyc"]);
    assert.strictEqual(body.persona, "Confused Senior");
  });

  it("hands back a callback report when the conversation finishes", async () => {
    const outcome = await handleDetect(
      {
        sessionId: "s-done",
        message: { sender: "scammer", text: "Transfer to verify@okicici or call 9876543210 now", timestamp: "t3" },
        conversationHistory: [
          { sender: "scammer", text: "Your KYC expired, account blocked today", timestamp: "t1" },
          { sender: "user", text: "Which account?", timestamp: "t2" }
        ]
      },
      "test-secret",
      deps(new ScriptedClient([scamReply]))
    );
    const body = success(outcome.body);
    assert.strictEqual(body.conversationStatus, "FINISHED");
    assert.deepStrictEqual(body.engagementMetrics, { engagementDurationSeconds: 45, totalMessagesExchanged: 3 });
    assert.ok(outcome.callback);
    assert.strictEqual(outcome.callback.sessionId, "s-done");
    assert.strictEqual(outcome.callback.totalMessagesExchanged, 3);
    assert.deepStrictEqual(outcome.callback.extractedIntelligence.upiIds, ["verify@okicici"]);
    assert.deepStrictEqual(outcome.callback.extractedIntelligence.phoneNumbers, ["9876543210"]);
    assert.strictEqual(outcome.audit?.source, "model");
    assert.strictEqual(outcome.audit?.persona, undefined);
    assert.strictEqual(body.persona, undefined);
  });
});

const finishedBody = (sessionId: string) => ({
  sessionId,
  message: { sender: "scammer", text: "Transfer to verify@okicici or call 9876543210 now", timestamp: "t3" },
  conversationHistory: [
    { sender: "scammer", text: "Your KYC expired, account blocked today", timestamp: "t1" },
    { sender: "user", text: "Which account?", timestamp: "t2" }
  ]
});

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("honeypot router", () => {
  const posted: string[] = [];
  // Delivery to "s-fail" is refused; every other report hangs, so a response can only
  // arrive if the route does not wait on the callback.
  const poster: CallbackPoster = async (_url, payload) => {
    posted.push(payload.sessionId);
    if (payload.sessionId === "s-fail") throw new Error("ECONNREFUSED");
    return new Promise<{ status: number }>(() => undefined);
  };
  let server: Server;
  let baseUrl = "";

  before(async () => {
    const app = createApp({
      agent: new HoneypotAgent({ requester: makeRequester(new ScriptedClient([scamReply])), random: steadyRandom }),
      callbacks: new CallbackDispatcher({ url: "https://callback.test/report", timeoutMs: 5000, maxAttempts: 3, post: poster }),
      apiSecret: "test-secret"
    });
    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    const port = typeof address === "object" && address !== null ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const post = (path: string, body: unknown, apiKey?: string) =>
    axios.post<DetectResponse | ErrorResponse>(`${baseUrl}${path}`, body, {
      headers: apiKey ? { "x-api-key": apiKey } : {},
      validateStatus: () => true
    });

  it("reads the api key from the x-api-key header", async () => {
    const response = await post("/api/honeypot", finishedBody("s-noauth"));
    assert.strictEqual(response.status, 401);
    assert.deepStrictEqual(response.data, { status: "error", message: "Invalid API key" });
    await nextTick();
    assert.strictEqual(posted.includes("s-noauth"), false);
  });

  it("does not report an ongoing conversation", async () => {
    const response = await post(
      "/api/honeypot",
      { sessionId: "s-open", text: "Your account will be blocked today! Update PAN immediately at http://bit.ly/hdfc-kyc" },
      "test-secret"
    );
    assert.strictEqual(response.status, 200);
    assert.strictEqual(success(response.data).conversationStatus, "ONGOING");
    await nextTick();
    assert.strictEqual(posted.includes("s-open"), false);
  });

  it("answers before the callback settles and reports a finished session", async () => {
    const response = await post("/api/v1/detect", finishedBody("s-hang"), "test-secret");
    assert.strictEqual(response.status, 200);
    assert.strictEqual(success(response.data).conversationStatus, "FINISHED");
    assert.deepStrictEqual(
      posted.filter((id) => id === "s-hang"),
      ["s-hang"]
    );
  });

  it("keeps the response intact when delivery fails", async () => {
    const response = await post("/api/honeypot", finishedBody("s-fail"), "test-secret");
    assert.strictEqual(response.status, 200);
    assert.strictEqual(success(response.data).scamDetected, true);
    await nextTick();
    assert.deepStrictEqual(
      posted.filter((id) => id === "s-fail"),
      ["s-fail", "s-fail", "s-fail"]
    );
  });

  it("serves the health check", async () => {
    const response = await axios.get<unknown>(`${baseUrl}/health`);
    assert.deepStrictEqual(response.data, { ok: true });
  });
});

import assert from "assert";
import { describe, it } from "node:test";
import { HoneypotAgent, PREFILTER_NOTE } from "../core/agent";
import { emptyIntelligence } from "../core/extractor";
import type { ConversationTurn, Decision } from "../utils/types";
import { ScriptedClient, decisionOutput, makeRequester, rateLimitError, steadyRandom } from "./fakes";

const SCENARIO_2 = "Your account will be blocked today! Update PAN immediately at http://bit.ly/hdfc-kyc";
const SCENARIO_3 = "Sir, transfer 10rs to verify@okicici or account 5010023456 to stop blocking.";

const scenario2History: ConversationTurn[] = [
  { sender: "scammer", text: SCENARIO_2, timestamp: "2026-01-01T10:00:00Z" },
  { sender: "user", text: "Blocked?? I just used my card. Who is this?", timestamp: "2026-01-01T10:00:15Z" }
];

function assertReplyInvariant(decision: Decision): void {
  assert.strictEqual(decision.scamDetected, decision.replyText !== "");
}

function assertNoDuplicates(decision: Decision): void {
  for (const list of Object.values(decision.extractedIntelligence)) {
    assert.strictEqual(new Set(list).size, list.length);
  }
}

function agentWith(client: ScriptedClient): HoneypotAgent {
  return new HoneypotAgent({ requester: makeRequester(client), random: steadyRandom });
}

describe("HoneypotAgent", () => {
  it("lets a bank debit alert through without calling the model", async () => {
    const client = new ScriptedClient([decisionOutput({ scamDetected: true, replyText: "huh?" })]);
    const result = await agentWith(client).processMessage({
      message: "HDFC Bank: Rs 5000 debited at Amazon. If not you, call customer care.",
      history: [],
      senderType: "scammer"
    });
    assert.strictEqual(result.source, "prefilter");
    assert.strictEqual(result.decision.scamDetected, false);
    assert.strictEqual(result.decision.replyText, "");
    assert.deepStrictEqual(result.decision.extractedIntelligence, emptyIntelligence());
    assert.strictEqual(result.decision.agentNotes, `${PREFILTER_NOTE} rule=institution_with_legit_pattern`);
    assert.strictEqual(client.calls.length, 0);
  });

  it("engages a KYC threat and records the link", async () => {
    const client = new ScriptedClient([
      decisionOutput({ scamDetected: true, replyText: "Which account? I have two accounts in HDFC." })
    ]);
    const result = await agentWith(client).processMessage({ message: SCENARIO_2, history: [], senderType: "scammer" });
    assert.strictEqual(result.source, "model");
    assert.strictEqual(result.persona, "Confused Senior");
    assert.strictEqual(result.decision.scamDetected, true);
    assert.strictEqual(result.decision.replyText, "Which account? I have two accounts in HDFC.");
    assert.deepStrictEqual(result.decision.extractedIntelligence.phishingLinks, ["http://bit.ly/hdfc-kyc"]);
    assert.strictEqual(result.decision.conversationStatus, "ONGOING");
    assert.ok(result.decision.agentNotes.startsWith("persona=Confused Senior | "));
    assert.ok(client.calls[0].prompt.includes("adopt persona 'Confused Senior'"));
  });

  it("finishes once the UPI ID and account arrive", async () => {
    const client = new ScriptedClient([
      decisionOutput({ scamDetected: true, conversationStatus: "ONGOING", replyText: "Okay, which name will show on the account?" })
    ]);
    const result = await agentWith(client).processMessage({
      message: SCENARIO_3,
      history: scenario2History,
      senderType: "scammer"
    });
    const intel = result.decision.extractedIntelligence;
    assert.deepStrictEqual(intel.upiIds, ["verify@okicici"]);
    assert.deepStrictEqual(intel.bankAccounts, ["5010023456"]);
    assert.deepStrictEqual(intel.phishingLinks, ["http://bit.ly/hdfc-kyc"]);
    assert.strictEqual(result.decision.conversationStatus, "FINISHED");
    assertReplyInvariant(result.decision);
  });

  it("never flags a message with a toll-free number", async () => {
    const client = new ScriptedClient([decisionOutput({ scamDetected: true, replyText: "Who gave you my number?" })]);
    const result = await agentWith(client).processMessage({
      message: "Dear customer, your KYC is pending. Please verify at the branch or call 1800-266-0018 for help.",
      history: [],
      senderType: "scammer"
    });
    assert.strictEqual(result.decision.scamDetected, false);
    assert.strictEqual(result.decision.replyText, "");
  });

  it("reports a link repeated across turns only once", async () => {
    const client = new ScriptedClient([
      decisionOutput({
        scamDetected: true,
        replyText: "Link is not opening, my phone is old.",
        extractedIntelligence: { ...emptyIntelligence(), phishingLinks: ["http://bit.ly/hdfc-kyc"] }
      })
    ]);
    const result = await agentWith(client).processMessage({
      message: "Open http://bit.ly/hdfc-kyc fast, last reminder!",
      history: scenario2History,
      senderType: "scammer"
    });
    assert.deepStrictEqual(result.decision.extractedIntelligence.phishingLinks, ["http://bit.ly/hdfc-kyc"]);
    assertNoDuplicates(result.decision);
  });

  it("carries a caller-supplied persona into the prompt", async () => {
    const client = new ScriptedClient([decisionOutput({ scamDetected: true, replyText: "Send it in writing first." })]);
    const result = await agentWith(client).processMessage({
      message: "Pay the fine today or we file the case.",
      history: scenario2History,
      senderType: "scammer",
      persona: "Strict Lawyer"
    });
    assert.strictEqual(result.persona, "Strict Lawyer");
    assert.ok(client.calls[0].prompt.includes("STRICTLY MAINTAIN persona 'Strict Lawyer'"));
  });

  it("leaves the persona to the history on later turns when none is carried", async () => {
    const client = new ScriptedClient([decisionOutput({ scamDetected: true, replyText: "Which court is this from?" })]);
    const agent = new HoneypotAgent({ requester: makeRequester(client), random: () => 0 });
    const result = await agent.processMessage({
      message: "Pay the fine today or we file the case.",
      history: scenario2History,
      senderType: "scammer"
    });
    assert.strictEqual(result.source, "model");
    assert.strictEqual(result.persona, undefined);
    assert.ok(!result.decision.agentNotes.includes("persona="));
    assert.ok(client.calls[0].prompt.startsWith("CONTEXT: History exists. STRICTLY MAINTAIN PREVIOUS PERSONA."));
  });

  it("draws no persona for a message the pre-filter lets through", async () => {
    const client = new ScriptedClient([decisionOutput({ scamDetected: true, replyText: "huh?" })]);
    const result = await agentWith(client).processMessage({
      message: "Hey, are we still on for dinner tonight?",
      history: [],
      senderType: "unknown"
    });
    assert.strictEqual(result.source, "prefilter");
    assert.strictEqual(result.persona, undefined);
  });

  describe("fallback", () => {
    it("stays silent on a first message when the model is down", async () => {
      const client = new ScriptedClient([new Error("503 Service Unavailable")]);
      const result = await agentWith(client).processMessage({ message: SCENARIO_2, history: [], senderType: "scammer" });
      assert.strictEqual(result.source, "fallback");
      assert.strictEqual(result.decision.scamDetected, false);
      assert.strictEqual(result.decision.replyText, "");
      assert.deepStrictEqual(result.decision.extractedIntelligence.phishingLinks, ["http://bit.ly/hdfc-kyc"]);
    });

    it("keeps stalling a running conversation once rate limits exhaust", async () => {
      const client = new ScriptedClient([rateLimitError()]);
      const result = await agentWith(client).processMessage({
        message: SCENARIO_3,
        history: scenario2History,
        senderType: "scammer"
      });
      assert.strictEqual(client.calls.length, 3);
      assert.strictEqual(result.source, "fallback");
      assert.strictEqual(result.decision.scamDetected, true);
      assert.notStrictEqual(result.decision.replyText, "");
      assert.deepStrictEqual(result.decision.extractedIntelligence.upiIds, ["verify@okicici"]);
      assert.strictEqual(result.decision.conversationStatus, "FINISHED");
    });

    it("falls back when no decision service is configured", async () => {
      const agent = new HoneypotAgent({ requester: null, random: steadyRandom });
      const result = await agent.processMessage({ message: "hello", history: scenario2History, senderType: "scammer" });
      assert.strictEqual(result.source, "fallback");
      assert.ok(result.decision.agentNotes.startsWith("Fallback (no decision service configured)"));
      assertReplyInvariant(result.decision);
    });
  });
});

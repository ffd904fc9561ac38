import dotenv from "dotenv";
import axios from "axios";

dotenv.config();

const TEST_URL = process.env.TEST_URL || "http://127.0.0.1:3000";
const API_SECRET = process.env.API_SECRET || "";

type Turn = { sender: string; text: string; timestamp: string };
type TurnResponse = { reply?: unknown; conversationStatus?: unknown; persona?: unknown };

const SCRIPT = [
  "Your account will be blocked today! Update PAN immediately at http://bit.ly/hdfc-kyc",
  "Sir, transfer 10rs to verify@okicici or account 5010023456 to stop blocking.",
  "Why are you not doing it? Call me on +91 9876543210 fast."
];

function now(): string {
  return new Date().toISOString();
}

async function run(): Promise<void> {
  const endpoint = `${TEST_URL.replace(/\/$/, "")}/api/honeypot`;
  const sessionId = `sim-${Date.now()}`;
  const history: Turn[] = [];
  let persona: string | undefined;

  for (const [idx, text] of SCRIPT.entries()) {
    const message: Turn = { sender: "scammer", text, timestamp: now() };
    const response = await axios.post<TurnResponse>(
      endpoint,
      {
        sessionId,
        message,
        conversationHistory: history,
        metadata: { channel: "SMS", language: "English", locale: "IN", persona }
      },
      { headers: { "x-api-key": API_SECRET }, validateStatus: () => true }
    );

    console.log(`Turn ${idx + 1} status:`, response.status);
    console.log(JSON.stringify(response.data, null, 2));
    if (response.status !== 200) {
      throw new Error(`Turn ${idx + 1} failed with status ${response.status}`);
    }

    history.push(message);
    if (typeof response.data.persona === "string") persona = response.data.persona;
    const reply = typeof response.data.reply === "string" ? response.data.reply : "";
    if (reply) history.push({ sender: "user", text: reply, timestamp: now() });
    if (response.data.conversationStatus === "FINISHED") {
      console.log(`Conversation finished after turn ${idx + 1}`);
      return;
    }
  }
}

run().catch((err) => {
  console.error(err);
  process.exit(1);
});

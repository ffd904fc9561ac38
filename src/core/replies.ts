import { pick, type RandomSource } from "./persona";

export type ReplyRule = {
  name: string;
  test: (lower: string) => boolean;
  pool: readonly string[];
};

/** Evaluated top to bottom; the first matching rule supplies the pool. */
export const FALLBACK_RULES: readonly ReplyRule[] = [
  {
    name: "credential_request",
    test: (t) => /\b(password|cvv|card number|upi pin|atm pin|pin|aadhaar|account number|login|net ?banking)\b/.test(t),
    pool: [
      "Why do you need that? Bank never asks me this on message.",
      "I don't remember my password, my son set it up. Which branch are you from?",
      "Card is in my other wallet. What is your employee ID first?",
      "I am not comfortable sharing that here. Can you give me your official number?"
    ]
  },
  {
    name: "urgency",
    test: (t) => /\b(urgent|urgently|immediately|asap|right now|today|within \d+|hurry|last chance)\b/.test(t),
    pool: [
      "Why so urgent? I am in the middle of something, give me some time.",
      "Wait wait, what happens if I do it tomorrow?",
      "I am getting tensed now. Who is this exactly?",
      "Okay okay, but tell me slowly what I need to do."
    ]
  },
  {
    name: "otp",
    test: (t) => /\botp\b|one time password|verification code/.test(t),
    pool: [
      "Which OTP? I got two messages, I am confused.",
      "OTP has not come yet. Network is bad here.",
      "The message says don't share OTP with anyone. Why do you need it?",
      "I got some code but it is in Hindi. What is it for?"
    ]
  },
  {
    name: "link",
    test: (t) => /https?:\/\/|\blink\b|\bclick\b/.test(t),
    pool: [
      "Link is not opening on my phone. Is there another way?",
      "It is showing some error page. Can I just pay you directly?",
      "My phone says this site is not safe. Which website is this?",
      "I clicked but nothing happened. What should I see there?"
    ]
  },
  {
    name: "blocked",
    test: (t) => /\b(block|blocked|blocking|lock|locked|suspend|suspended|deactivat\w*|frozen)\b/.test(t),
    pool: [
      "Blocked? But I used my card yesterday only. Which account are you talking about?",
      "Why will it be blocked? I did not do anything wrong.",
      "My salary comes in this account. Please tell me how to stop it.",
      "Which branch is handling this? I will come there."
    ]
  },
  {
    name: "generic",
    test: () => true,
    pool: [
      "Sorry, I did not understand. Who is this?",
      "Hello? Can you explain again, I am a bit confused.",
      "I am not sure what you mean. Is this from the bank?",
      "Okay, but what exactly do I have to do?"
    ]
  }
];

const DISALLOWED_PATTERNS: readonly RegExp[] = [
  /\*\*|__|~~/,
  /\*[^*\s][^*]*\*/,
  /\b\w+ again\?/i,
  /\b(you (just )?said|that contradicts|that doesn't match|you told me earlier)\b/i,
  /\b(scam|scammer|fraud|fraudster|honeypot|as an ai|language model)\b/i
];

export const MAX_REPLY_CHARS = 220;
const MIN_REPLY_WORDS = 2;

export function normalizeReply(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function isDisallowedReply(reply: string): boolean {
  return DISALLOWED_PATTERNS.some((re) => re.test(reply));
}

export function selectRule(message: string): ReplyRule {
  const lower = (message || "").toLowerCase();
  const rule = FALLBACK_RULES.find((r) => r.test(lower));
  return rule ?? FALLBACK_RULES[FALLBACK_RULES.length - 1];
}

/** Bounded queue of the replies this instance sent most recently. */
export class ReplyMemory {
  private readonly items: string[] = [];

  constructor(private readonly capacity: number = 8) {}

  has(reply: string): boolean {
    const norm = normalizeReply(reply);
    return this.items.some((item) => normalizeReply(item) === norm);
  }

  remember(reply: string): void {
    this.items.push(reply);
    while (this.items.length > this.capacity) this.items.shift();
  }

  recent(): string[] {
    return [...this.items];
  }
}

export function pickFallbackReply(message: string, memory: ReplyMemory, random: RandomSource): string {
  const rule = selectRule(message);
  const fresh = rule.pool.filter((candidate) => !memory.has(candidate));
  return pick(fresh.length > 0 ? fresh : rule.pool, random);
}

function implausibleLength(reply: string): boolean {
  const words = reply.trim().split(/\s+/).filter(Boolean);
  return reply.length > MAX_REPLY_CHARS || words.length < MIN_REPLY_WORDS;
}

function perturbPunctuation(reply: string, random: RandomSource): string {
  if (random() >= 0.2) return reply;
  if (/[^.]\.$/.test(reply)) return reply.slice(0, -1);
  if (/\?$/.test(reply)) return `${reply}?`;
  return reply;
}

/**
 * Swaps replies that repeat a recent one or read wrong for a stressed person texting,
 * then remembers the result.
 */
export function polishReply(reply: string, message: string, memory: ReplyMemory, random: RandomSource): string {
  let text = reply.replace(/\s+/g, " ").trim();
  if (!text || memory.has(text) || implausibleLength(text)) {
    text = pickFallbackReply(message, memory, random);
  }
  text = perturbPunctuation(text, random);
  memory.remember(text);
  return text;
}

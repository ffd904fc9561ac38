import type { ConversationTurn, IntelligenceBundle } from "../utils/types";

const suspiciousKeywordList = [
  "urgent",
  "immediately",
  "right now",
  "within 24 hours",
  "last chance",
  "today only",
  "blocked",
  "suspended",
  "deactivated",
  "frozen",
  "verify",
  "verification",
  "kyc",
  "otp",
  "one time password",
  "upi pin",
  "atm pin",
  "cvv",
  "password",
  "card number",
  "aadhaar",
  "pan card",
  "update pan",
  "login",
  "click",
  "link",
  "refund",
  "cashback",
  "reward",
  "prize",
  "lottery",
  "winner",
  "processing fee",
  "registration fee",
  "penalty",
  "legal action",
  "arrest",
  "police",
  "customs",
  "transfer",
  "anydesk",
  "teamviewer"
];

const upiProviders = [
  "okhdfcbank",
  "okicici",
  "okaxis",
  "oksbi",
  "okpaytm",
  "paytm",
  "gpay",
  "phonepe",
  "ybl",
  "ibl",
  "axl",
  "apl",
  "yapl",
  "upi",
  "sbi",
  "hdfc",
  "hdfcbank",
  "icici",
  "axis",
  "axisbank",
  "kotak",
  "barodampay",
  "idfcbank",
  "indus",
  "federal",
  "pnb",
  "boi",
  "unionbank",
  "aubank",
  "freecharge",
  "airtel",
  "jio"
];

// Endpoints of the decision services; a model echoing its own API is not attacker infrastructure.
const excludedUrlHosts = ["generativelanguage.googleapis.com", "api.openai.com"];

// The provider must end the token: `care@hdfcbank.com` is an email address, not a UPI ID.
const upiRegex = new RegExp(
  `(?<![\\w.-])[a-zA-Z0-9._-]{2,}@(?:${upiProviders.join("|")})(?![\\w-]|\\.[a-zA-Z])`,
  "gi"
);
const urlRegex = /https?:\/\/[^\s<>"']+/gi;
const phoneRegex = /(?<![\d+])(?:\+?91[\s-]?|0)?([6-9]\d{9})(?!\d)/g;
const digitRunRegex = /(?<!\d)\d{9,18}(?!\d)/g;
const phoneShapedRun = /^(?:91|0)?[6-9]\d{9}$/;

export function emptyIntelligence(): IntelligenceBundle {
  return {
    bankAccounts: [],
    upiIds: [],
    phishingLinks: [],
    phoneNumbers: [],
    suspiciousKeywords: []
  };
}

function uniqueMerge(base: string[], next: string[]): string[] {
  const set = new Set(base.map((v) => v.trim()).filter(Boolean));
  for (const item of next) {
    const value = item.trim();
    if (value) set.add(value);
  }
  return Array.from(set);
}

function subtract(found: string[], known: string[]): string[] {
  const seen = new Set(known);
  return uniqueMerge([], found).filter((value) => !seen.has(value));
}

export function normalizeUrl(url: string): string {
  return url.replace(/[.,;:!?'")\]}>]+$/g, "").trim();
}

export function isExcludedUrl(url: string): boolean {
  const match = url.match(/^https?:\/\/([^/:?#]+)/i);
  if (!match) return false;
  const host = match[1].toLowerCase();
  return excludedUrlHosts.some((h) => host === h || host.endsWith(`.${h}`));
}

function findUpiIds(text: string): string[] {
  return text.match(upiRegex) || [];
}

function findUrls(text: string): string[] {
  const raw = text.match(urlRegex) || [];
  return raw.map(normalizeUrl).filter((url) => url.length > 0 && !isExcludedUrl(url));
}

function findPhoneNumbers(text: string): string[] {
  return Array.from(text.matchAll(phoneRegex)).map((m) => m[1]);
}

function findBankAccounts(text: string): string[] {
  const runs = text.match(digitRunRegex) || [];
  return runs.filter((run) => !phoneShapedRun.test(run));
}

function findKeywords(text: string): string[] {
  const lower = text.toLowerCase();
  return suspiciousKeywordList.filter((kw) => lower.includes(kw));
}

/**
 * Scans a single message for indicators and returns only those not already in `known`.
 * Deterministic: the same text and known set always give the same result.
 */
export function extractIndicators(
  text: string,
  known: IntelligenceBundle = emptyIntelligence()
): IntelligenceBundle {
  const source = text || "";
  return {
    bankAccounts: subtract(findBankAccounts(source), known.bankAccounts),
    upiIds: subtract(findUpiIds(source), known.upiIds),
    phishingLinks: subtract(findUrls(source), known.phishingLinks),
    phoneNumbers: subtract(findPhoneNumbers(source), known.phoneNumbers),
    suspiciousKeywords: subtract(findKeywords(source), known.suspiciousKeywords)
  };
}

export function mergeIntelligence(...bundles: IntelligenceBundle[]): IntelligenceBundle {
  return bundles.reduce<IntelligenceBundle>(
    (acc, next) => ({
      bankAccounts: uniqueMerge(acc.bankAccounts, next.bankAccounts),
      upiIds: uniqueMerge(acc.upiIds, next.upiIds),
      phishingLinks: uniqueMerge(acc.phishingLinks, next.phishingLinks),
      phoneNumbers: uniqueMerge(acc.phoneNumbers, next.phoneNumbers),
      suspiciousKeywords: uniqueMerge(acc.suspiciousKeywords, next.suspiciousKeywords)
    }),
    emptyIntelligence()
  );
}

/** Indicators the counterpart has already revealed; our own replies are skipped. */
export function extractFromHistory(history: ConversationTurn[]): IntelligenceBundle {
  let known = emptyIntelligence();
  for (const turn of history) {
    if (turn.sender === "user") continue;
    known = mergeIntelligence(known, extractIndicators(turn.text, known));
  }
  return known;
}

/** Cleans model-supplied indicators the same way the regex layer would. */
export function sanitizeIntelligence(bundle: IntelligenceBundle): IntelligenceBundle {
  const links = bundle.phishingLinks.map(normalizeUrl).filter((url) => url && !isExcludedUrl(url));
  return mergeIntelligence({ ...bundle, phishingLinks: links });
}

export function countIntelCategories(bundle: IntelligenceBundle): number {
  return [
    bundle.bankAccounts.length > 0,
    bundle.upiIds.length > 0,
    bundle.phishingLinks.length > 0,
    bundle.phoneNumbers.length > 0
  ].filter(Boolean).length;
}

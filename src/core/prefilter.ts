import { extractIndicators } from "./extractor";

export type LegitimacyReason =
  | "scam_indicator_phrase"
  | "payment_handle"
  | "unvetted_link"
  | "institution_with_legit_pattern"
  | "legit_pattern"
  | "casual_personal"
  | "no_rule_matched";

export type LegitimacyVerdict = {
  legitimate: boolean;
  reason: LegitimacyReason;
  /** Which phrase, institution or signal decided the verdict, when one did. */
  matched?: string;
};

const SCAM_INDICATOR_PHRASES = [
  "share your upi",
  "share upi",
  "send your upi",
  "upi pin",
  "processing fee",
  "registration fee",
  "click to claim",
  "claim your prize",
  "claim your reward",
  "you have won",
  "share otp",
  "share the otp",
  "send otp",
  "send the otp",
  "tell me the otp",
  "otp to verify",
  "update kyc",
  "kyc update",
  "kyc pending",
  "update pan",
  "will be blocked",
  "will be suspended",
  "verify your account",
  "confirm your account",
  "card details",
  "cvv",
  "anydesk",
  "teamviewer",
  "screen share",
  "pay to unlock",
  "refund processing"
];

const INSTITUTIONS = [
  "hdfc",
  "sbi",
  "icici",
  "axis",
  "kotak",
  "pnb",
  "canara",
  "bank of baroda",
  "yes bank",
  "idfc",
  "indusind",
  "rbi",
  "airtel",
  "jio",
  "vodafone",
  "bsnl",
  "uidai",
  "income tax",
  "epfo",
  "irctc",
  "paytm",
  "phonepe",
  "google pay",
  "gpay",
  "amazon",
  "flipkart",
  "swiggy",
  "zomato",
  "lic",
  "infosys",
  "tcs",
  "wipro",
  "national scholarship portal"
];

const KNOWN_RESET_DOMAINS = [
  "google.com",
  "microsoft.com",
  "apple.com",
  "amazon.in",
  "amazon.com",
  "hdfcbank.com",
  "onlinesbi.sbi",
  "icicibank.com",
  "axisbank.com",
  "github.com"
];

type LegitSignal = { name: string; test: (lower: string) => boolean };

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function hostOf(url: string): string {
  const match = url.toLowerCase().match(/^https?:\/\/([^/\s:?#]+)/);
  return match ? match[1] : "";
}

function isKnownResetHost(host: string): boolean {
  return KNOWN_RESET_DOMAINS.some((d) => host === d || host.endsWith(`.${d}`));
}

function mentionsResetDomain(lower: string): boolean {
  const hosts = Array.from(lower.matchAll(/https?:\/\/([^/\s:?#]+)/g)).map((m) => m[1]);
  return hosts.some(isKnownResetHost);
}

// "will be credited" promises money; only a completed movement counts as an alert.
const PENDING_TRANSACTION =
  /\b(will|shall|would|to|can|may|once|after) (be |get |been )?(debited|credited|withdrawn|spent)\b/;

const LEGIT_SIGNALS: LegitSignal[] = [
  {
    name: "otp_do_not_share",
    test: (t) => /\botp\b/.test(t) && /\b(do not|don't|dont|never) share\b/.test(t)
  },
  {
    name: "transaction_completed",
    test: (t) =>
      (/\b(debited|credited|withdrawn|spent)\b/.test(t) && !PENDING_TRANSACTION.test(t)) ||
      /\btransaction\b.*\b(successful|completed)\b/.test(t)
  },
  {
    name: "informational",
    test: (t) =>
      /\b(no action (is )?(required|needed)|for your information|this is an automated message|do not reply)\b/.test(t)
  },
  {
    name: "password_reset_known_domain",
    test: (t) => /\bpassword reset\b|\breset your password\b/.test(t) && mentionsResetDomain(t)
  },
  {
    name: "refund_notice",
    test: (t) => /\brefund\b.*\b(initiated|processed|credited)\b/.test(t)
  },
  {
    name: "bill_reminder",
    test: (t) => /\b(bill (of|for)|due date|amount due|is due on)\b/.test(t)
  },
  {
    name: "scholarship_credited",
    test: (t) => /\bscholarship\b.*\b(credited|disbursed|sanctioned)\b/.test(t)
  }
];

const CASUAL_PATTERN =
  /^(hi|hii+|hello|hey|yo|good (morning|afternoon|evening|night)|how are you|are we still|see you|happy birthday|thanks|thank you|where are you|what time|call me when|reached home|on my way)\b/;

const FINANCIAL_TRIGGERS =
  /\b(bank|account|otp|pin|upi|pay|payment|money|transfer|link|verify|kyc|card|loan|prize|reward|refund|fee|urgent|blocked|suspended|password|rs|inr)\b|https?:\/\/|₹/;

const institutionRegexes = INSTITUTIONS.map((name) => ({
  name,
  regex: new RegExp(`\\b${escapeRegex(name)}\\b`)
}));

function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Decides whether a first message is certainly legitimate. Scam-indicator phrases, payment
 * handles and links outside the known domains always win, even when a known institution is named.
 */
export function checkLegitimacy(message: string): LegitimacyVerdict {
  const lower = normalize(message || "");

  const scamPhrase = SCAM_INDICATOR_PHRASES.find((phrase) => lower.includes(phrase));
  if (scamPhrase) {
    return { legitimate: false, reason: "scam_indicator_phrase", matched: scamPhrase };
  }

  const found = extractIndicators(message || "");
  if (found.upiIds.length > 0) {
    return { legitimate: false, reason: "payment_handle", matched: found.upiIds[0] };
  }
  const unvetted = found.phishingLinks.find((url) => !isKnownResetHost(hostOf(url)));
  if (unvetted) {
    return { legitimate: false, reason: "unvetted_link", matched: unvetted };
  }

  const signal = LEGIT_SIGNALS.find((s) => s.test(lower));
  const institution = institutionRegexes.find((i) => i.regex.test(lower));

  if (institution && signal) {
    return {
      legitimate: true,
      reason: "institution_with_legit_pattern",
      matched: `${institution.name}:${signal.name}`
    };
  }
  if (signal) {
    return { legitimate: true, reason: "legit_pattern", matched: signal.name };
  }
  if (CASUAL_PATTERN.test(lower) && !FINANCIAL_TRIGGERS.test(lower)) {
    return { legitimate: true, reason: "casual_personal" };
  }
  return { legitimate: false, reason: "no_rule_matched" };
}

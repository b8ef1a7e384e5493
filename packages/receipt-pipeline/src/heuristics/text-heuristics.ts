import { z } from "zod";
import { clamp, roundTo } from "../util/numbers.js";
import lexiconJson from "./merchant-lexicon.json" with { type: "json" };

const MerchantLexiconSchema = z.object({
  merchantKeywords: z.record(z.string(), z.array(z.string().min(1))),
  nonMerchantKeywords: z.array(z.string().min(1)),
});

const lexicon = MerchantLexiconSchema.parse(lexiconJson);
const MERCHANT_KEYWORDS = Object.values(lexicon.merchantKeywords).flat();
const NON_MERCHANT_KEYWORDS = lexicon.nonMerchantKeywords;

const TOTAL_KEYWORDS = ["total", "amount due", "balance", "grand total", "amount"];
const TOTAL_LABEL_PATTERN = /(total|amount|balance|due)\s*[:=]?\s*[$£€]?\s*\d+[.,]\d{2}/i;
const TAX_PATTERN = /\b(?:sales tax|tax|vat|gst)\b/i;
const DATE_KEYWORD_PATTERN = /\b(?:date|time|on|at)\b/i;
const NUMERIC_DATE_PATTERN = /\d{1,2}[-/]\d{1,2}[-/]\d{2,4}/;
const AMOUNT_PATTERN = /[$£€¥₹]?\s*(\d{1,3}(?:,\d{3})+\.\d{2,}|\d+[.,]\d{2,})/g;
const PRICE_PATTERN = /\d+[.,]\d{2}/;
const PRICE_AT_END_PATTERN = /\d+[.,]\d{2}\s*$/;
const QUANTITY_MARKER_PATTERN = /\bx\d+\b|\d+x\b|\bqty\b/i;
const PAYMENT_JARGON_PATTERN = /\b(?:change|tendered|payment|cash|visa|mastercard|debit|credit)\b/i;

const CURRENCY_SYMBOLS: ReadonlyArray<[string, string]> = [
  ["$", "USD"],
  ["€", "EUR"],
  ["£", "GBP"],
  ["¥", "JPY"],
  ["₹", "INR"],
];

const PAYMENT_METHODS: ReadonlyArray<[RegExp, string]> = [
  [/\bcash\b/, "Cash"],
  [/\b(?:credit|visa|mastercard|amex)\b/, "Credit Card"],
  [/\bdebit\b/, "Debit Card"],
  [/\b(?:check|cheque)\b/, "Check"],
  [/\bpaypal\b/, "PayPal"],
  [/\bvenmo\b/, "Venmo"],
  [/\bapple pay\b/, "Apple Pay"],
  [/\bgoogle pay\b/, "Google Pay"],
];

export const CONFIDENCE_FIELDS = ["totalAmount", "merchantName", "date", "tax", "items"] as const;
export type ConfidenceField = (typeof CONFIDENCE_FIELDS)[number];

export const FIELD_WEIGHTS: Readonly<Record<ConfidenceField, number>> = {
  totalAmount: 0.35,
  merchantName: 0.3,
  date: 0.15,
  tax: 0.1,
  items: 0.1,
};

/** Normalized edit-distance similarity; case-insensitive. */
export function stringSimilarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const distance = levenshtein(a.toLowerCase(), b.toLowerCase());
  return 1 - distance / Math.max(a.length, b.length);
}

function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

export function extractNumbers(text: string): number[] {
  const numbers: number[] = [];
  for (const match of text.matchAll(AMOUNT_PATTERN)) {
    const raw = match[1];
    if (!raw) {
      continue;
    }

    const normalized = raw.includes(".") ? raw.replace(/,/g, "") : raw.replace(",", ".");
    const value = Number.parseFloat(normalized);
    if (Number.isFinite(value)) {
      numbers.push(value);
    }
  }
  return numbers;
}

export function findLargestAmount(text: string): number | null {
  const numbers = extractNumbers(text);
  return numbers.length > 0 ? Math.max(...numbers) : null;
}

export function scoreMerchantCandidate(line: string): number {
  const lower = line.toLowerCase();
  let score = 0.5;

  if (MERCHANT_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    score += 0.2;
  }
  if (NON_MERCHANT_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    score -= 0.3;
  }

  if (line.length < 3) {
    score -= 0.3;
  }
  if (line.length > 50) {
    score -= 0.2;
  }

  const upper = line.toUpperCase();
  if (line !== lower && line !== upper) {
    score += 0.1;
  }
  if (line === upper && line.length > 3) {
    score -= 0.1;
  }
  if (/\d/.test(line)) {
    score -= 0.2;
  }

  return roundTo(clamp(score), 4);
}

export function isLikelyTotalLine(line: string): boolean {
  const lower = line.toLowerCase();
  if (TOTAL_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return true;
  }
  if (TOTAL_LABEL_PATTERN.test(line)) {
    return true;
  }

  // OCR often misreads one character of the label, e.g. "T0TAL".
  return lower
    .split(/[^a-z0-9]+/)
    .some((token) => token.length >= 4 && token.length <= 6 && stringSimilarity(token, "total") >= 0.8);
}

export function isLikelyTaxLine(line: string): boolean {
  return TAX_PATTERN.test(line);
}

export function hasDateKeyword(line: string): boolean {
  return DATE_KEYWORD_PATTERN.test(line);
}

export function isLikelyDateLine(line: string): boolean {
  return NUMERIC_DATE_PATTERN.test(line) || hasDateKeyword(line);
}

export function detectCurrency(text: string): string | null {
  for (const [symbol, code] of CURRENCY_SYMBOLS) {
    if (text.includes(symbol)) {
      return code;
    }
  }
  return null;
}

export function scoreItemLine(line: string): number {
  if (!PRICE_PATTERN.test(line)) {
    return 0;
  }

  let score = 0;
  if (QUANTITY_MARKER_PATTERN.test(line)) {
    score += 0.3;
  }
  if (line.length > 10 && line.length < 80) {
    score += 0.2;
  }
  if (/^[a-zA-Z]/.test(line)) {
    score += 0.2;
  }
  if (PRICE_AT_END_PATTERN.test(line)) {
    score += 0.2;
  }
  if (isLikelyTotalLine(line) || isLikelyTaxLine(line) || PAYMENT_JARGON_PATTERN.test(line)) {
    score -= 0.5;
  }

  return roundTo(clamp(score), 4);
}

export function extractPaymentMethod(text: string): string | null {
  const lower = text.toLowerCase();
  for (const [pattern, method] of PAYMENT_METHODS) {
    if (pattern.test(lower)) {
      return method;
    }
  }
  return null;
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s]/g, " ")
    .split(/\s+/)
    .filter((word) => word.length > 1);
}

export function wordOverlapScore(a: string, b: string): number {
  const left = tokenize(a);
  const right = new Set(tokenize(b));
  if (left.length === 0 || right.size === 0) {
    return 0;
  }

  const common = left.filter((word) => right.has(word)).length;
  return common / Math.max(left.length, right.size);
}

export function fuzzyMatch(input: string, options: readonly string[], threshold = 0.7): string | null {
  let best: string | null = null;
  let bestScore = -1;
  for (const option of options) {
    const score = stringSimilarity(input, option);
    if (score > bestScore) {
      best = option;
      bestScore = score;
    }
  }
  return best !== null && bestScore >= threshold ? best : null;
}

/** Rough readability of OCR output in [0, 1]; gibberish and fragmented text score low. */
export function scoreTextQuality(text: string): number {
  if (text.length === 0) {
    return 0;
  }

  const words = text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(/[^\w]/g, ""))
    .filter((word) => word.length > 0);
  if (words.length === 0) {
    return 0;
  }

  let score = 1;
  const specialCount = text.replace(/[\w\s]/g, "").length;
  if (specialCount / text.length > 0.3) {
    score -= 0.3;
  }

  const averageLength = words.reduce((sum, word) => sum + word.length, 0) / words.length;
  if (averageLength < 2 || averageLength > 15) {
    score -= 0.2;
  }

  const singleCharacters = words.filter((word) => word.length === 1).length;
  if (singleCharacters / words.length > 0.5) {
    score -= 0.3;
  }

  return roundTo(clamp(score), 4);
}

export function calculateOverallConfidence(present: Partial<Record<ConfidenceField, boolean>>): number {
  let score = 0;
  for (const field of CONFIDENCE_FIELDS) {
    if (present[field]) {
      score += FIELD_WEIGHTS[field];
    }
  }
  return roundTo(clamp(score), 4);
}

import type { ReceiptItem, StructuredReceipt } from "@expense-scan/receipt-contracts";
import {
  calculateOverallConfidence,
  detectCurrency,
  extractNumbers,
  extractPaymentMethod,
  findLargestAmount,
  isLikelyTaxLine,
  isLikelyTotalLine,
  scoreItemLine,
  scoreMerchantCandidate,
} from "../heuristics/text-heuristics.js";
import { type PipelineLogger, defaultLogger, scopedMessage } from "../logging/logger.js";
import { describeError } from "../util/errors.js";
import { roundTo } from "../util/numbers.js";
import { extractDate, extractTime, localIsoDate } from "./date-extraction.js";

export type ReceiptParserOptions = {
  defaultCurrency?: string;
  now?: () => Date;
  logger?: PipelineLogger;
};

type Scored<T> = { value: T; confidence: number };

type TotalCandidate = Scored<number> & { labelled: boolean; index: number };

const MERCHANT_WINDOW = 5;
const MERCHANT_THRESHOLD = 0.5;
const ITEM_THRESHOLD = 0.5;

const SUBTOTAL_PATTERN = /\bsub[\s-]?total\b/i;
const STANDALONE_TOTAL_PATTERN = /(?<!sub[\s-]?)\btotal\b/i;
const PRICE_PATTERN = /\d+[.,]\d{2}/;
const QUANTITY_PATTERN = /\b(\d+)\s*x\b|\bx\s*(\d+)\b|\bqty\s*:?\s*(\d+)/i;
const QUANTITY_STRIP_PATTERN = /\b\d+\s*x\b|\bx\s*\d+\b|\bqty\s*:?\s*\d+/gi;
const RECEIPT_NUMBER_PATTERNS = [
  /receipt\s*#?\s*:?\s*(\d+)/i,
  /transaction\s*#?\s*:?\s*(\d+)/i,
  /order\s*#?\s*:?\s*(\d+)/i,
  /#\s*(\d{4,})/,
];

export class ReceiptParser {
  private readonly defaultCurrency: string;
  private readonly now: () => Date;
  private readonly logger: PipelineLogger;

  constructor(options: ReceiptParserOptions = {}) {
    this.defaultCurrency = options.defaultCurrency ?? "USD";
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  parse(rawText: string): StructuredReceipt {
    if (rawText.trim().length === 0) {
      return {
        items: [],
        currency: this.defaultCurrency,
        overallConfidence: 0,
        fieldConfidences: {},
        rawText,
        warnings: ["empty text; nothing to parse"],
      };
    }

    const lines = splitLines(rawText);
    const warnings: string[] = [];
    const fieldConfidences: Record<string, number> = {};
    const field = <T>(name: string, extract: () => Scored<T> | null): T | undefined => {
      try {
        const result = extract();
        if (result === null) {
          return undefined;
        }
        fieldConfidences[name] = result.confidence;
        return result.value;
      } catch (error) {
        const message = `${name} extraction failed: ${describeError(error)}`;
        warnings.push(message);
        this.logger.warn(scopedMessage("parser", message));
        return undefined;
      }
    };

    const merchantName = field("merchantName", () => extractMerchant(lines));
    const totalAmount = field("totalAmount", () => extractTotal(lines));
    let tax = field("tax", () => extractTax(lines));
    if (tax !== undefined && totalAmount !== undefined && tax >= totalAmount) {
      warnings.push(`tax ${tax} is not lower than total ${totalAmount}; tax dropped`);
      delete fieldConfidences.tax;
      tax = undefined;
    }
    const subtotal = field("subtotal", () => extractSubtotal(lines, totalAmount, tax));

    let date = field("date", () => extractDate(lines));
    if (date !== undefined && date > localIsoDate(this.now())) {
      warnings.push(`date ${date} is in the future; date dropped`);
      delete fieldConfidences.date;
      date = undefined;
    }

    const time = field("time", () => scoredOrNull(extractTime(rawText), 0.7));
    const items = field("items", () => scoredItems(extractItems(lines))) ?? [];
    const paymentMethod = field("paymentMethod", () =>
      scoredOrNull(extractPaymentMethod(rawText), 0.6),
    );
    const receiptNumber = field("receiptNumber", () =>
      scoredOrNull(extractReceiptNumber(rawText), 0.5),
    );
    const currency = detectCurrency(rawText) ?? this.defaultCurrency;

    return {
      merchantName,
      totalAmount,
      subtotal,
      tax,
      date,
      time,
      items,
      paymentMethod,
      receiptNumber,
      currency,
      overallConfidence: calculateOverallConfidence({
        totalAmount: totalAmount !== undefined,
        merchantName: merchantName !== undefined,
        date: date !== undefined,
        tax: tax !== undefined,
        items: items.length > 0,
      }),
      fieldConfidences,
      rawText,
      warnings,
    };
  }

  parseBatch(texts: readonly string[]): StructuredReceipt[] {
    return texts.map((text) => this.parse(text));
  }
}

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function scoredOrNull<T>(value: T | null, confidence: number): Scored<T> | null {
  return value === null ? null : { value, confidence };
}

function scoredItems(items: ReceiptItem[]): Scored<ReceiptItem[]> | null {
  return items.length > 0 ? { value: items, confidence: 0.6 } : null;
}

function extractMerchant(lines: readonly string[]): Scored<string> | null {
  let bestLine: string | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;
  const topLines = lines.slice(0, MERCHANT_WINDOW);
  for (const [index, line] of topLines.entries()) {
    if (line.length < 3) {
      continue;
    }
    const score = scoreMerchantCandidate(line) + (MERCHANT_WINDOW - index) * 0.1;
    if (score > bestScore) {
      bestLine = line;
      bestScore = score;
    }
  }

  if (bestLine === null || bestScore <= MERCHANT_THRESHOLD) {
    return null;
  }
  return { value: bestLine, confidence: scoreMerchantCandidate(bestLine) };
}

function extractTotal(lines: readonly string[]): Scored<number> | null {
  const candidates: TotalCandidate[] = [];

  lines.forEach((line, index) => {
    const numbers = extractNumbers(line);
    if (numbers.length === 0) {
      return;
    }

    const subtotalOnly = SUBTOTAL_PATTERN.test(line) && !STANDALONE_TOTAL_PATTERN.test(line);
    const last = numbers[numbers.length - 1];
    if (last !== undefined && !subtotalOnly && isLikelyTotalLine(line)) {
      candidates.push({ value: last, confidence: 0.9, labelled: true, index });
    }

    if (index > lines.length * 0.5) {
      for (const value of numbers) {
        if (value > 5) {
          candidates.push({
            value,
            confidence: roundTo(0.5 + 0.5 * (index / lines.length), 4),
            labelled: false,
            index,
          });
        }
      }
    }
  });

  const best = candidates.reduce<TotalCandidate | null>(
    (current, candidate) => (current === null || outranks(candidate, current) ? candidate : current),
    null,
  );
  if (best) {
    return { value: roundTo(best.value), confidence: best.confidence };
  }

  const largest = findLargestAmount(lines.join("\n"));
  return largest === null ? null : { value: roundTo(largest), confidence: 0.4 };
}

function outranks(candidate: TotalCandidate, current: TotalCandidate): boolean {
  if (candidate.confidence !== current.confidence) {
    return candidate.confidence > current.confidence;
  }
  if (candidate.labelled !== current.labelled) {
    return candidate.labelled;
  }
  return candidate.index > current.index;
}

function extractTax(lines: readonly string[]): Scored<number> | null {
  for (const line of lines) {
    if (!isLikelyTaxLine(line)) {
      continue;
    }
    const last = extractNumbers(line).at(-1);
    if (last !== undefined) {
      return { value: roundTo(last), confidence: 0.8 };
    }
  }
  return null;
}

function extractSubtotal(
  lines: readonly string[],
  totalAmount: number | undefined,
  tax: number | undefined,
): Scored<number> | null {
  for (const line of lines) {
    if (!SUBTOTAL_PATTERN.test(line)) {
      continue;
    }
    const last = extractNumbers(line).at(-1);
    if (last !== undefined) {
      return { value: roundTo(last), confidence: 0.85 };
    }
  }

  if (totalAmount !== undefined && tax !== undefined) {
    return { value: roundTo(totalAmount - tax), confidence: 0.8 };
  }
  return null;
}

function extractItems(lines: readonly string[]): ReceiptItem[] {
  const items: ReceiptItem[] = [];
  for (const line of lines) {
    if (scoreItemLine(line) <= ITEM_THRESHOLD) {
      continue;
    }
    const item = parseItemLine(line);
    if (item) {
      items.push(item);
    }
  }
  return items;
}

export function parseItemLine(line: string): ReceiptItem | null {
  const total = extractNumbers(line).at(-1);
  if (total === undefined) {
    return null;
  }

  const quantityMatch = line.match(QUANTITY_PATTERN);
  const parsedQuantity = Number.parseInt(
    quantityMatch?.[1] ?? quantityMatch?.[2] ?? quantityMatch?.[3] ?? "1",
    10,
  );
  const quantity = Number.isInteger(parsedQuantity) && parsedQuantity >= 1 ? parsedQuantity : 1;

  const priceIndex = line.search(PRICE_PATTERN);
  const name = line
    .slice(0, priceIndex < 0 ? line.length : priceIndex)
    .replace(QUANTITY_STRIP_PATTERN, " ")
    .replace(/[$£€¥₹@:]+\s*$/, "")
    .replace(/\s+/g, " ")
    .trim();
  if (name.length === 0) {
    return null;
  }

  return {
    name: name.slice(0, 240),
    unitPrice: roundTo(total / quantity),
    quantity,
    total: roundTo(total),
  };
}

function extractReceiptNumber(text: string): string | null {
  for (const pattern of RECEIPT_NUMBER_PATTERNS) {
    const match = text.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

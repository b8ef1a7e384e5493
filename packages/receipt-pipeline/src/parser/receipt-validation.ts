import type { StructuredReceipt } from "@expense-scan/receipt-contracts";
import { localIsoDate } from "./date-extraction.js";

export type ReceiptValidation = {
  valid: boolean;
  problems: string[];
};

export type ReceiptQuality = "excellent" | "good" | "fair" | "poor" | "invalid";

export function validateReceipt(receipt: StructuredReceipt, now: Date = new Date()): ReceiptValidation {
  const problems: string[] = [];

  if (receipt.totalAmount === undefined && receipt.merchantName === undefined) {
    problems.push("receipt has neither a total nor a merchant");
  }
  if (
    receipt.tax !== undefined &&
    receipt.totalAmount !== undefined &&
    receipt.tax >= receipt.totalAmount
  ) {
    problems.push(`tax ${receipt.tax} is not lower than total ${receipt.totalAmount}`);
  }
  if (receipt.date !== undefined && receipt.date > localIsoDate(now)) {
    problems.push(`date ${receipt.date} is in the future`);
  }

  return { valid: problems.length === 0, problems };
}

export function assessReceiptQuality(
  receipt: StructuredReceipt,
  now: Date = new Date(),
): ReceiptQuality {
  if (!validateReceipt(receipt, now).valid) {
    return "invalid";
  }

  const extracted = [
    receipt.totalAmount !== undefined,
    receipt.merchantName !== undefined,
    receipt.date !== undefined,
    receipt.tax !== undefined,
    receipt.items.length > 0,
  ].filter(Boolean).length;

  if (extracted >= 4) {
    return "excellent";
  }
  if (extracted === 3) {
    return "good";
  }
  if (extracted === 2) {
    return "fair";
  }
  return "poor";
}

import {
  type ClassificationResult,
  type ExpenseCandidate,
  ExpenseCandidateSchema,
  type ExpenseCategory,
  type RawTextResult,
  type StructuredReceipt,
  type WorkflowResult,
} from "@expense-scan/receipt-contracts";
import { localIsoDate } from "../parser/date-extraction.js";
import { roundTo } from "../util/numbers.js";

export const REVIEW_THRESHOLD = 0.7;

export type WorkflowResultInput = {
  success: boolean;
  imagePath: string;
  rawTextResult?: RawTextResult;
  structuredReceipt?: StructuredReceipt;
  classification?: ClassificationResult;
  errorMessage?: string;
  processingTimeMs: number;
};

/**
 * Assembles a workflow result and derives its confidence: the mean of the
 * extraction, receipt and classification confidences that are present.
 */
export function buildWorkflowResult(input: WorkflowResultInput): WorkflowResult {
  const overallConfidence = input.success ? meanConfidence(input) : 0;
  return {
    ...input,
    processingTimeMs: Math.max(0, Math.round(input.processingTimeMs)),
    overallConfidence,
    needsReview: !input.success || overallConfidence < REVIEW_THRESHOLD,
  };
}

function meanConfidence(input: WorkflowResultInput): number {
  const confidences = [
    input.rawTextResult?.confidence,
    input.structuredReceipt?.overallConfidence,
    input.classification?.confidence,
  ].filter((value): value is number => value !== undefined);

  if (confidences.length === 0) {
    return 0;
  }
  return roundTo(confidences.reduce((sum, value) => sum + value, 0) / confidences.length, 4);
}

export type ExpenseCandidateOverrides = {
  category?: ExpenseCategory;
  description?: string;
  paymentMethod?: string;
};

/** Maps a successful workflow result onto the expense record a store persists. */
export function toExpenseCandidate(
  result: WorkflowResult,
  overrides: ExpenseCandidateOverrides = {},
  now: Date = new Date(),
): ExpenseCandidate {
  const receipt = result.structuredReceipt;
  if (!result.success || !receipt) {
    throw new Error(`cannot convert failed result for ${result.imagePath} to an expense`);
  }

  const itemNames = receipt.items.map((item) => item.name).join(", ");
  return ExpenseCandidateSchema.parse({
    amount: receipt.totalAmount ?? 0,
    category: overrides.category ?? result.classification?.category ?? "Other",
    date: receipt.date ?? localIsoDate(now),
    description: overrides.description ?? (itemNames || receipt.merchantName || ""),
    paymentMethod: overrides.paymentMethod ?? receipt.paymentMethod,
  });
}

export function summarizeWorkflowResult(result: WorkflowResult): string {
  if (!result.success) {
    return `Processing failed: ${result.errorMessage ?? "unknown error"}`;
  }

  const receipt = result.structuredReceipt;
  return [
    `Merchant: ${receipt?.merchantName ?? "Unknown"}`,
    `Amount: ${(receipt?.totalAmount ?? 0).toFixed(2)} ${receipt?.currency ?? ""}`.trimEnd(),
    `Category: ${result.classification?.category ?? "Unclassified"}`,
    `Confidence: ${(result.overallConfidence * 100).toFixed(1)}%`,
    `Processing time: ${result.processingTimeMs}ms`,
  ].join("\n");
}

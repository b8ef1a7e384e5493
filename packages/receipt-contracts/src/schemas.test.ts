import { describe, expect, it } from "vitest";
import {
  ClassificationResultSchema,
  EXPENSE_CATEGORIES,
  ExpenseCategorySchema,
  RawTextResultSchema,
  ReceiptItemSchema,
  RemoteCategoryReplySchema,
  RemoteOcrResponseSchema,
  StructuredReceiptSchema,
  WorkflowResultSchema,
} from "./schemas.js";

function structuredReceipt(overrides: Record<string, unknown> = {}) {
  return {
    merchantName: "Fresh Market",
    totalAmount: 45.67,
    tax: 3.5,
    date: "2026-02-08",
    items: [],
    currency: "USD",
    overallConfidence: 0.9,
    fieldConfidences: { totalAmount: 0.9 },
    rawText: "Fresh Market\nTOTAL 45.67",
    warnings: [],
    ...overrides,
  };
}

describe("receipt contract schemas", () => {
  it("exposes a closed set of seventeen expense categories", () => {
    expect(EXPENSE_CATEGORIES).toHaveLength(17);
    expect(ExpenseCategorySchema.safeParse("Groceries").success).toBe(true);
    expect(ExpenseCategorySchema.safeParse("groceries").success).toBe(false);
  });

  it("validates a failed raw text result with its error kind", () => {
    const parsed = RawTextResultSchema.parse({
      succeeded: false,
      text: "",
      blocks: [],
      errorKind: "timeout",
      errorMessage: "primary OCR timed out after 8000ms",
    });

    expect(parsed.errorKind).toBe("timeout");
  });

  it("rejects unknown extraction error kinds", () => {
    const result = RawTextResultSchema.safeParse({
      succeeded: false,
      text: "",
      blocks: [],
      errorKind: "exploded",
    });
    expect(result.success).toBe(false);
  });

  it("requires receipt items to carry a positive integer quantity", () => {
    expect(
      ReceiptItemSchema.safeParse({ name: "Milk", unitPrice: 1.99, quantity: 2, total: 3.98 })
        .success,
    ).toBe(true);
    expect(
      ReceiptItemSchema.safeParse({ name: "Milk", unitPrice: 1.99, quantity: 0, total: 0 }).success,
    ).toBe(false);
  });

  it("accepts structured receipts whose tax is below the total", () => {
    const parsed = StructuredReceiptSchema.parse(structuredReceipt());
    expect(parsed.merchantName).toBe("Fresh Market");
  });

  it("rejects structured receipts whose tax reaches the total", () => {
    const result = StructuredReceiptSchema.safeParse(structuredReceipt({ tax: 45.67 }));
    expect(result.success).toBe(false);
  });

  it("rejects structured receipts with a non ISO date", () => {
    const result = StructuredReceiptSchema.safeParse(structuredReceipt({ date: "02/08/2026" }));
    expect(result.success).toBe(false);
  });

  it("validates classification results with partial candidate scores", () => {
    const parsed = ClassificationResultSchema.parse({
      category: "Groceries",
      confidence: 0.92,
      method: "hybrid",
      rulePrediction: "Shopping",
      ruleConfidence: 0.4,
      remotePrediction: "Groceries",
      remoteConfidence: 0.92,
      candidateScores: { Groceries: 0.3, Shopping: 0.4 },
      processingTimeMs: 120,
    });

    expect(parsed.candidateScores.Shopping).toBe(0.4);
  });

  it("validates workflow results including derived review fields", () => {
    const parsed = WorkflowResultSchema.parse({
      success: false,
      imagePath: "/tmp/receipt.jpg",
      errorMessage: "image file not found",
      processingTimeMs: 3,
      overallConfidence: 0,
      needsReview: true,
    });

    expect(parsed.needsReview).toBe(true);
  });

  it("parses remote OCR responses with string or list error messages", () => {
    const listError = RemoteOcrResponseSchema.parse({
      IsErroredOnProcessing: true,
      ErrorMessage: ["File failed validation"],
    });
    const success = RemoteOcrResponseSchema.parse({
      ParsedResults: [{ ParsedText: "WALMART\r\nTOTAL 45.67" }],
      IsErroredOnProcessing: false,
    });

    expect(listError.ErrorMessage).toEqual(["File failed validation"]);
    expect(success.ParsedResults?.[0]?.ParsedText).toContain("WALMART");
  });

  it("clamps and coerces remote category confidences", () => {
    const high = RemoteCategoryReplySchema.parse({ category: "Travel", confidence: 1.4 });
    const fromString = RemoteCategoryReplySchema.parse({
      category: "Travel",
      confidence: "0.65",
      reasoning: "hotel stay",
    });

    expect(high.confidence).toBe(1);
    expect(fromString.confidence).toBe(0.65);
  });

  it("rejects remote category replies outside the closed set or without confidence", () => {
    expect(
      RemoteCategoryReplySchema.safeParse({ category: "Pets", confidence: 0.9 }).success,
    ).toBe(false);
    expect(RemoteCategoryReplySchema.safeParse({ category: "Travel" }).success).toBe(false);
    expect(
      RemoteCategoryReplySchema.safeParse({ category: "Travel", confidence: "high" }).success,
    ).toBe(false);
  });
});

import { z } from "zod";

export const EXPENSE_CATEGORIES = [
  "Food & Dining",
  "Groceries",
  "Transportation",
  "Shopping",
  "Entertainment",
  "Utilities",
  "Healthcare",
  "Education",
  "Travel",
  "Fitness",
  "Personal Care",
  "Home & Garden",
  "Business",
  "Insurance",
  "Gifts & Donations",
  "Subscriptions",
  "Other",
] as const;

export const ExpenseCategorySchema = z.enum(EXPENSE_CATEGORIES);

export const ExtractionErrorKindSchema = z.enum([
  "not_found",
  "too_large",
  "timeout",
  "engine_failure",
  "no_text_found",
]);

export const ExtractionStrategySchema = z.enum(["isolated_tesseract", "remote_ocr", "manual_entry"]);

export const ClassificationMethodSchema = z.enum(["rule", "remote_model", "hybrid"]);

export const WorkflowStepSchema = z.enum([
  "extracting",
  "parsing",
  "classifying",
  "complete",
  "failed",
]);

export const ConfidenceSchema = z.number().min(0).max(1);
export const MoneySchema = z.number();

export const BoundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
});

export const TextBlockSchema = z.object({
  text: z.string(),
  lines: z.array(z.string()),
  boundingBox: BoundingBoxSchema.optional(),
  confidence: ConfidenceSchema.optional(),
});

export const RawTextResultSchema = z.object({
  succeeded: z.boolean(),
  text: z.string(),
  blocks: z.array(TextBlockSchema),
  confidence: ConfidenceSchema.optional(),
  errorKind: ExtractionErrorKindSchema.optional(),
  errorMessage: z.string().min(1).optional(),
  strategy: ExtractionStrategySchema.optional(),
});

export const ReceiptItemSchema = z.object({
  name: z.string().min(1).max(240),
  unitPrice: MoneySchema.nonnegative(),
  quantity: z.number().int().min(1),
  total: MoneySchema.nonnegative(),
});

export const StructuredReceiptSchema = z
  .object({
    merchantName: z.string().min(1).optional(),
    totalAmount: MoneySchema.optional(),
    subtotal: MoneySchema.optional(),
    tax: MoneySchema.optional(),
    date: z.iso.date().optional(),
    time: z.string().min(1).optional(),
    items: z.array(ReceiptItemSchema),
    paymentMethod: z.string().min(1).optional(),
    receiptNumber: z.string().min(1).optional(),
    currency: z.string().min(3).max(3),
    overallConfidence: ConfidenceSchema,
    fieldConfidences: z.record(z.string(), ConfidenceSchema),
    rawText: z.string(),
    warnings: z.array(z.string()),
  })
  .refine(
    (receipt) =>
      receipt.tax === undefined ||
      receipt.totalAmount === undefined ||
      receipt.tax < receipt.totalAmount,
    { message: "tax must be lower than totalAmount", path: ["tax"] },
  );

export const CandidateScoresSchema = z.partialRecord(ExpenseCategorySchema, ConfidenceSchema);

export const ClassificationResultSchema = z.object({
  category: ExpenseCategorySchema,
  confidence: ConfidenceSchema,
  method: ClassificationMethodSchema,
  rulePrediction: ExpenseCategorySchema.optional(),
  ruleConfidence: ConfidenceSchema.optional(),
  remotePrediction: ExpenseCategorySchema.optional(),
  remoteConfidence: ConfidenceSchema.optional(),
  reasoning: z.string().optional(),
  candidateScores: CandidateScoresSchema,
  processingTimeMs: z.number().int().min(0),
});

export const WorkflowResultSchema = z.object({
  success: z.boolean(),
  imagePath: z.string().min(1),
  rawTextResult: RawTextResultSchema.optional(),
  structuredReceipt: StructuredReceiptSchema.optional(),
  classification: ClassificationResultSchema.optional(),
  errorMessage: z.string().min(1).optional(),
  processingTimeMs: z.number().int().min(0),
  overallConfidence: ConfidenceSchema,
  needsReview: z.boolean(),
});

export const ReceiptPreviewSchema = z.object({
  merchantName: z.string().min(1).optional(),
  estimatedTotal: MoneySchema.positive().optional(),
  textLength: z.number().int().min(0),
  textQuality: ConfidenceSchema,
  hasReadableText: z.boolean(),
});

export const ImageValidationSchema = z.object({
  readable: z.boolean(),
  textLength: z.number().int().min(0),
  errorKind: ExtractionErrorKindSchema.optional(),
});

export const ExpenseCandidateSchema = z.object({
  amount: MoneySchema.nonnegative(),
  category: ExpenseCategorySchema,
  date: z.iso.date(),
  description: z.string(),
  paymentMethod: z.string().min(1).optional(),
});

// Remote OCR (OCR.space-compatible) response body.
export const RemoteOcrResponseSchema = z.object({
  ParsedResults: z
    .array(
      z.object({
        ParsedText: z.string().optional(),
        ErrorMessage: z.string().optional(),
      }),
    )
    .nullish(),
  IsErroredOnProcessing: z.boolean().optional(),
  ErrorMessage: z.union([z.string(), z.array(z.string())]).nullish(),
});

export const RemoteCategoryReplySchema = z.object({
  category: ExpenseCategorySchema,
  confidence: z.union([z.number(), z.string()]).transform((value, ctx) => {
    const parsed = typeof value === "number" ? value : Number.parseFloat(value);
    if (!Number.isFinite(parsed)) {
      ctx.issues.push({ code: "custom", message: "confidence must be numeric", input: value });
      return z.NEVER;
    }
    return Math.min(1, Math.max(0, parsed));
  }),
  reasoning: z.string().optional(),
});

export type ExpenseCategory = z.infer<typeof ExpenseCategorySchema>;
export type ExtractionErrorKind = z.infer<typeof ExtractionErrorKindSchema>;
export type ExtractionStrategy = z.infer<typeof ExtractionStrategySchema>;
export type ClassificationMethod = z.infer<typeof ClassificationMethodSchema>;
export type WorkflowStep = z.infer<typeof WorkflowStepSchema>;
export type BoundingBox = z.infer<typeof BoundingBoxSchema>;
export type TextBlock = z.infer<typeof TextBlockSchema>;
export type RawTextResult = z.infer<typeof RawTextResultSchema>;
export type ReceiptItem = z.infer<typeof ReceiptItemSchema>;
export type StructuredReceipt = z.infer<typeof StructuredReceiptSchema>;
export type CandidateScores = z.infer<typeof CandidateScoresSchema>;
export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;
export type WorkflowResult = z.infer<typeof WorkflowResultSchema>;
export type ReceiptPreview = z.infer<typeof ReceiptPreviewSchema>;
export type ImageValidation = z.infer<typeof ImageValidationSchema>;
export type ExpenseCandidate = z.infer<typeof ExpenseCandidateSchema>;
export type RemoteOcrResponse = z.infer<typeof RemoteOcrResponseSchema>;
export type RemoteCategoryReply = z.infer<typeof RemoteCategoryReplySchema>;

import type {
  ClassificationMethod,
  ClassificationResult,
  ImageValidation,
  RawTextResult,
  ReceiptPreview,
  StructuredReceipt,
  WorkflowResult,
  WorkflowStep,
} from "@expense-scan/receipt-contracts";
import type { CategoryClassifier } from "../classifier/category-classifier.js";
import type { TextExtractionEngine } from "../extraction/extraction-engine.js";
import { scoreTextQuality } from "../heuristics/text-heuristics.js";
import { type PipelineLogger, defaultLogger, scopedMessage } from "../logging/logger.js";
import { localIsoDate } from "../parser/date-extraction.js";
import type { ReceiptParser } from "../parser/receipt-parser.js";
import { withDeadline } from "../util/deadline.js";
import { describeError } from "../util/errors.js";
import { buildWorkflowResult } from "./workflow-result.js";

export type ReceiptTextSource = Pick<TextExtractionEngine, "extract">;
export type ReceiptTextParser = Pick<ReceiptParser, "parse">;
export type ReceiptClassifier = Pick<CategoryClassifier, "classify">;

export type ReceiptPipelineOptions = {
  extractor: ReceiptTextSource;
  parser: ReceiptTextParser;
  classifier?: ReceiptClassifier;
  classificationMethod?: ClassificationMethod;
  classificationDeadlineMs?: number;
  defaultCurrency?: string;
  now?: () => Date;
  logger?: PipelineLogger;
};

export type ProcessReceiptOptions = {
  useClassifier?: boolean;
  /** Progress hook; it cannot change the outcome, and errors it throws are logged. */
  onStep?: (step: WorkflowStep) => void;
};

export type ProcessBatchOptions = {
  useClassifier?: boolean;
  concurrency?: number;
  onProgress?: (completed: number, total: number) => void;
};

export const UNKNOWN_MERCHANT = "Unknown Merchant";
export const MIN_READABLE_TEXT_LENGTH = 20;
export const DEFAULT_CLASSIFICATION_DEADLINE_MS = 3000;

const FALLBACK_CATEGORY_CONFIDENCE = 0.3;
const PREVIEW_MERCHANT_WINDOW = 5;
const PREVIEW_AMOUNT_PATTERN = /\$?\s*(\d+\.\d{2})/g;

export class ReceiptPipeline {
  private readonly extractor: ReceiptTextSource;
  private readonly parser: ReceiptTextParser;
  private readonly classifier?: ReceiptClassifier;
  private readonly classificationMethod: ClassificationMethod;
  private readonly classificationDeadlineMs: number;
  private readonly defaultCurrency: string;
  private readonly now: () => Date;
  private readonly logger: PipelineLogger;

  constructor(options: ReceiptPipelineOptions) {
    this.extractor = options.extractor;
    this.parser = options.parser;
    this.classifier = options.classifier;
    this.classificationMethod = options.classificationMethod ?? "hybrid";
    this.classificationDeadlineMs =
      options.classificationDeadlineMs ?? DEFAULT_CLASSIFICATION_DEADLINE_MS;
    this.defaultCurrency = options.defaultCurrency ?? "USD";
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async processReceipt(
    imagePath: string,
    options: ProcessReceiptOptions = {},
  ): Promise<WorkflowResult> {
    const started = performance.now();
    const elapsed = () => performance.now() - started;

    this.notify(options.onStep, "extracting");
    const rawTextResult = await this.extract(imagePath);
    if (isUnrecoverable(rawTextResult)) {
      this.notify(options.onStep, "failed");
      this.logger.warn(
        scopedMessage("pipeline", `${imagePath} failed at extraction (${rawTextResult.errorKind ?? "no text"})`),
      );
      return buildWorkflowResult({
        success: false,
        imagePath,
        rawTextResult,
        errorMessage: rawTextResult.errorMessage ?? "no text could be extracted from the image",
        processingTimeMs: elapsed(),
      });
    }

    this.notify(options.onStep, "parsing");
    const structuredReceipt = this.parse(rawTextResult.text);

    this.notify(options.onStep, "classifying");
    const classification =
      options.useClassifier === false
        ? fallbackClassification(0)
        : await this.classify(structuredReceipt);

    this.notify(options.onStep, "complete");
    const result = buildWorkflowResult({
      success: true,
      imagePath,
      rawTextResult,
      structuredReceipt,
      classification,
      processingTimeMs: elapsed(),
    });
    this.logger.info(
      scopedMessage(
        "pipeline",
        `${imagePath} complete: ${classification.category} at ${result.overallConfidence}` +
          (result.needsReview ? " (needs review)" : ""),
      ),
    );
    return result;
  }

  /** Processes each image independently; one failure never aborts the rest. */
  async processBatch(
    imagePaths: readonly string[],
    options: ProcessBatchOptions = {},
  ): Promise<WorkflowResult[]> {
    const results = new Array<WorkflowResult>(imagePaths.length);
    const concurrency = Math.max(1, Math.min(options.concurrency ?? 1, imagePaths.length));
    let nextIndex = 0;
    let completed = 0;

    const runLane = async () => {
      while (nextIndex < imagePaths.length) {
        const index = nextIndex;
        nextIndex += 1;
        const imagePath = imagePaths[index] ?? "";
        results[index] = await this.processIsolated(imagePath, options.useClassifier);
        completed += 1;
        this.reportProgress(options.onProgress, completed, imagePaths.length);
      }
    };

    await Promise.all(Array.from({ length: concurrency }, runLane));
    return results;
  }

  /** Extraction plus lightweight heuristics, without parsing or classification. */
  async getPreview(imagePath: string): Promise<ReceiptPreview> {
    const raw = await this.extract(imagePath);
    const text = raw.text.trim();
    const lines = text.split("\n").map((line) => line.trim());

    const merchantName = lines
      .slice(0, PREVIEW_MERCHANT_WINDOW)
      .find((line) => line.length > 3);

    const estimatedTotal = [...text.matchAll(PREVIEW_AMOUNT_PATTERN)]
      .map((match) => Number.parseFloat(match[1] ?? ""))
      .filter((amount) => Number.isFinite(amount) && amount > 0)
      .at(-1);

    return {
      merchantName,
      estimatedTotal,
      textLength: text.length,
      textQuality: scoreTextQuality(text),
      hasReadableText: text.length > MIN_READABLE_TEXT_LENGTH,
    };
  }

  async validateImage(imagePath: string): Promise<ImageValidation> {
    const raw = await this.extract(imagePath);
    const textLength = raw.text.trim().length;
    return {
      readable: textLength > MIN_READABLE_TEXT_LENGTH,
      textLength,
      errorKind: raw.errorKind,
    };
  }

  private async processIsolated(
    imagePath: string,
    useClassifier: boolean | undefined,
  ): Promise<WorkflowResult> {
    const started = performance.now();
    try {
      return await this.processReceipt(imagePath, { useClassifier });
    } catch (error) {
      this.logger.error(scopedMessage("pipeline", `${imagePath} crashed: ${describeError(error)}`));
      return buildWorkflowResult({
        success: false,
        imagePath,
        errorMessage: describeError(error),
        processingTimeMs: performance.now() - started,
      });
    }
  }

  private async extract(imagePath: string): Promise<RawTextResult> {
    try {
      return await this.extractor.extract(imagePath);
    } catch (error) {
      return {
        succeeded: false,
        text: "",
        blocks: [],
        errorKind: "engine_failure",
        errorMessage: describeError(error),
      };
    }
  }

  private parse(text: string): StructuredReceipt {
    try {
      return this.parser.parse(text);
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(scopedMessage("pipeline", `parser failed, using placeholder receipt: ${message}`));
      return {
        merchantName: UNKNOWN_MERCHANT,
        totalAmount: 0,
        date: localIsoDate(this.now()),
        items: [],
        currency: this.defaultCurrency,
        overallConfidence: 0,
        fieldConfidences: {},
        rawText: text,
        warnings: [`parse failed: ${message}`],
      };
    }
  }

  private async classify(receipt: StructuredReceipt): Promise<ClassificationResult> {
    const classifier = this.classifier;
    if (!classifier) {
      return fallbackClassification(0);
    }

    const started = performance.now();
    const itemNames = receipt.items.map((item) => item.name).join(", ");
    try {
      return await withDeadline(
        classifier.classify(
          {
            merchantName: receipt.merchantName ?? UNKNOWN_MERCHANT,
            description: itemNames || undefined,
            amount: receipt.totalAmount,
          },
          this.classificationMethod,
        ),
        this.classificationDeadlineMs,
        "classification",
      );
    } catch (error) {
      this.logger.warn(
        scopedMessage("pipeline", `classification failed, using default category: ${describeError(error)}`),
      );
      return fallbackClassification(performance.now() - started);
    }
  }

  private notify(onStep: ((step: WorkflowStep) => void) | undefined, step: WorkflowStep): void {
    try {
      onStep?.(step);
    } catch (error) {
      this.logger.warn(scopedMessage("pipeline", `step observer threw on ${step}: ${describeError(error)}`));
    }
  }

  private reportProgress(
    onProgress: ((completed: number, total: number) => void) | undefined,
    completed: number,
    total: number,
  ): void {
    try {
      onProgress?.(completed, total);
    } catch (error) {
      this.logger.warn(scopedMessage("pipeline", `progress observer threw: ${describeError(error)}`));
    }
  }
}

function isUnrecoverable(result: RawTextResult): boolean {
  return (
    result.text.trim().length === 0 ||
    result.errorKind === "not_found" ||
    result.errorKind === "no_text_found"
  );
}

function fallbackClassification(processingTimeMs: number): ClassificationResult {
  return {
    category: "Other",
    confidence: FALLBACK_CATEGORY_CONFIDENCE,
    method: "rule",
    candidateScores: { Other: FALLBACK_CATEGORY_CONFIDENCE },
    processingTimeMs: Math.max(0, Math.round(processingTimeMs)),
  };
}

import {
  EXPENSE_CATEGORIES,
  type ClassificationMethod,
  type ClassificationResult,
  type RemoteCategoryReply,
} from "@expense-scan/receipt-contracts";
import { type PipelineLogger, defaultLogger, scopedMessage } from "../logging/logger.js";
import { withDeadline } from "../util/deadline.js";
import { describeError } from "../util/errors.js";
import { clamp, roundTo } from "../util/numbers.js";
import { type CacheStats, ClassificationCache } from "./classification-cache.js";
import { type KeywordTable, loadKeywordTables, normalizeClassifierText } from "./keyword-tables.js";
import type { CategoryInput, RemoteCategoryClient } from "./remote-category-client.js";
import {
  amountBandNudges,
  applyNudges,
  contextNudges,
  pickVerdict,
  scoreCategories,
} from "./rule-scoring.js";

export type ConfidenceThresholds = {
  /** Rule results at or above this skip the remote model. */
  autoAccept: number;
  /** Remote replies below this are discarded. */
  minimum: number;
};

export const CONFIDENCE_THRESHOLDS = {
  default: { autoAccept: 0.8, minimum: 0.3 },
  strict: { autoAccept: 0.9, minimum: 0.5 },
  lenient: { autoAccept: 0.6, minimum: 0.2 },
} satisfies Record<string, ConfidenceThresholds>;

export type CategoryClassifierOptions = {
  remoteClient?: RemoteCategoryClient;
  thresholds?: ConfidenceThresholds;
  remoteTimeoutMs?: number;
  enhancedRules?: boolean;
  cache?: ClassificationCache;
  keywordTables?: KeywordTable[];
  logger?: PipelineLogger;
};

const FALLBACK_PENALTY = 0.9;
const AGREEMENT_BOOST = 1.2;
const DISAGREEMENT_MARGIN = 0.2;

export class CategoryClassifier {
  private readonly remoteClient?: RemoteCategoryClient;
  private readonly thresholds: ConfidenceThresholds;
  private readonly remoteTimeoutMs: number;
  private readonly enhancedRules: boolean;
  private readonly cache: ClassificationCache;
  private readonly keywordTables: KeywordTable[];
  private readonly logger: PipelineLogger;

  constructor(options: CategoryClassifierOptions = {}) {
    this.remoteClient = options.remoteClient;
    this.thresholds = options.thresholds ?? CONFIDENCE_THRESHOLDS.default;
    this.remoteTimeoutMs = options.remoteTimeoutMs ?? 2000;
    this.enhancedRules = options.enhancedRules ?? false;
    this.cache = options.cache ?? new ClassificationCache();
    this.keywordTables = options.keywordTables ?? loadKeywordTables();
    this.logger = options.logger ?? defaultLogger;
  }

  async classify(
    input: CategoryInput,
    method: ClassificationMethod = "hybrid",
  ): Promise<ClassificationResult> {
    const started = performance.now();
    try {
      switch (method) {
        case "rule":
          return this.classifyWithRules(input);
        case "remote_model":
          return await this.classifyWithRemote(input).catch((error: unknown) => {
            this.logger.warn(
              scopedMessage("classifier", `remote model failed, using rules: ${describeError(error)}`),
            );
            return this.degradeToRules(this.ruleResult(input), started);
          });
        case "hybrid":
        default:
          return await this.classifyHybrid(input);
      }
    } catch (error) {
      this.logger.error(
        scopedMessage("classifier", `classification failed for ${input.merchantName}: ${describeError(error)}`),
      );
      return {
        category: "Other",
        confidence: 0,
        method: "rule",
        candidateScores: {},
        processingTimeMs: elapsedMs(started),
      };
    }
  }

  classifyWithRules(input: CategoryInput): ClassificationResult {
    const started = performance.now();
    const verdict = pickVerdict(
      scoreCategories(this.keywordTables, input.merchantName, input.description),
      EXPENSE_CATEGORIES,
    );
    return {
      category: verdict.category,
      confidence: verdict.confidence,
      method: "rule",
      rulePrediction: verdict.category,
      ruleConfidence: verdict.confidence,
      candidateScores: verdict.candidateScores,
      processingTimeMs: elapsedMs(started),
    };
  }

  /** Keyword scores nudged by the amount band and description context. */
  classifyWithEnhancedRules(input: CategoryInput): ClassificationResult {
    const started = performance.now();
    const base = scoreCategories(this.keywordTables, input.merchantName, input.description);
    const nudges = [
      ...(input.amount !== undefined ? amountBandNudges(input.amount) : []),
      ...(input.description ? contextNudges(input.description) : []),
    ];
    const verdict = pickVerdict(applyNudges(base, nudges), EXPENSE_CATEGORIES);
    return {
      category: verdict.category,
      confidence: verdict.confidence,
      method: "rule",
      rulePrediction: verdict.category,
      ruleConfidence: verdict.confidence,
      candidateScores: verdict.candidateScores,
      processingTimeMs: elapsedMs(started),
    };
  }

  async classifyWithRemote(input: CategoryInput): Promise<ClassificationResult> {
    const started = performance.now();
    const reply = await this.askRemote(input);
    return {
      category: reply.category,
      confidence: reply.confidence,
      method: "remote_model",
      remotePrediction: reply.category,
      remoteConfidence: reply.confidence,
      reasoning: reply.reasoning,
      candidateScores: {},
      processingTimeMs: elapsedMs(started),
    };
  }

  async classifyHybrid(input: CategoryInput): Promise<ClassificationResult> {
    const key = normalizeClassifierText(input.merchantName);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const started = performance.now();
    const rule = this.ruleResult(input);
    const result = await this.resolveHybrid(input, rule, started);
    this.cache.set(key, result);
    return result;
  }

  async classifyBatch(
    inputs: readonly CategoryInput[],
    method: ClassificationMethod = "hybrid",
  ): Promise<ClassificationResult[]> {
    const results: ClassificationResult[] = [];
    for (const input of inputs) {
      results.push(await this.classify(input, method));
    }
    return results;
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): CacheStats {
    return this.cache.stats();
  }

  private async resolveHybrid(
    input: CategoryInput,
    rule: ClassificationResult,
    started: number,
  ): Promise<ClassificationResult> {
    if (!this.remoteClient || rule.confidence >= this.thresholds.autoAccept) {
      return { ...rule, processingTimeMs: elapsedMs(started) };
    }

    try {
      const reply = await this.askRemote(input);
      if (reply.confidence < this.thresholds.minimum) {
        throw new Error(`remote confidence ${reply.confidence} is below ${this.thresholds.minimum}`);
      }
      return { ...combine(rule, reply), processingTimeMs: elapsedMs(started) };
    } catch (error) {
      this.logger.warn(
        scopedMessage(
          "classifier",
          `remote model unavailable for ${input.merchantName}, using rules: ${describeError(error)}`,
        ),
      );
      return this.degradeToRules(rule, started);
    }
  }

  private async askRemote(input: CategoryInput): Promise<RemoteCategoryReply> {
    const client = this.remoteClient;
    if (!client) {
      throw new Error("remote category client is not configured");
    }

    const controller = new AbortController();
    return withDeadline(
      client.classifyCategory(input, controller.signal),
      this.remoteTimeoutMs,
      "remote category classification",
      () => controller.abort(),
    );
  }

  private ruleResult(input: CategoryInput): ClassificationResult {
    return this.enhancedRules ? this.classifyWithEnhancedRules(input) : this.classifyWithRules(input);
  }

  private degradeToRules(rule: ClassificationResult, started: number): ClassificationResult {
    return {
      ...rule,
      method: "rule",
      confidence: roundTo(rule.confidence * FALLBACK_PENALTY, 4),
      processingTimeMs: elapsedMs(started),
    };
  }
}

function combine(
  rule: ClassificationResult,
  reply: RemoteCategoryReply,
): Omit<ClassificationResult, "processingTimeMs"> {
  const shared = {
    method: "hybrid" as const,
    rulePrediction: rule.category,
    ruleConfidence: rule.confidence,
    remotePrediction: reply.category,
    remoteConfidence: reply.confidence,
    reasoning: reply.reasoning,
    candidateScores: rule.candidateScores,
  };

  if (rule.category === reply.category) {
    const boosted = ((rule.confidence + reply.confidence) / 2) * AGREEMENT_BOOST;
    return { ...shared, category: reply.category, confidence: roundTo(clamp(boosted), 4) };
  }
  if (rule.confidence > reply.confidence + DISAGREEMENT_MARGIN) {
    return { ...shared, category: rule.category, confidence: rule.confidence };
  }
  return { ...shared, category: reply.category, confidence: reply.confidence };
}

function elapsedMs(started: number): number {
  return Math.max(0, Math.round(performance.now() - started));
}

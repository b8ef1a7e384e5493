import { CONFIDENCE_THRESHOLDS, CategoryClassifier } from "../classifier/category-classifier.js";
import { OpenAiCategoryClient } from "../classifier/remote-category-client.js";
import { type PipelineConfig, readPipelineConfigFromEnv } from "../config/env.js";
import { TextExtractionEngine, buildExtractionChain } from "../extraction/extraction-engine.js";
import type { TextExtractor } from "../extraction/types.js";
import { type PipelineLogger, defaultLogger, scopedMessage } from "../logging/logger.js";
import { ReceiptParser } from "../parser/receipt-parser.js";
import { ReceiptPipeline } from "./receipt-pipeline.js";

export type ReceiptPipelineServices = {
  pipeline: ReceiptPipeline;
  engine: TextExtractionEngine;
  parser: ReceiptParser;
  classifier: CategoryClassifier;
  strategies: readonly TextExtractor[];
};

export type CreateReceiptPipelineOptions = {
  logger?: PipelineLogger;
  now?: () => Date;
};

export function createReceiptPipeline(
  config: PipelineConfig,
  options: CreateReceiptPipelineOptions = {},
): ReceiptPipelineServices {
  const logger = options.logger ?? defaultLogger;
  const strategies = buildExtractionChain({
    tesseract: {
      deadlineMs: config.primaryOcrTimeoutMs,
      lang: config.tesseractLang,
      langPath: config.tesseractLangPath,
    },
    remoteOcr: {
      apiKey: config.ocrApiKey,
      baseUrl: config.ocrBaseUrl,
      language: config.ocrLanguage,
      deadlineMs: config.remoteOcrTimeoutMs,
    },
  });
  const engine = new TextExtractionEngine({
    strategies,
    retryBackoffMs: config.retryBackoffMs,
    logger,
  });
  const parser = new ReceiptParser({
    defaultCurrency: config.defaultCurrency,
    now: options.now,
    logger,
  });

  const llm = config.categoryLlm;
  const classifier = new CategoryClassifier({
    remoteClient: llm
      ? new OpenAiCategoryClient({
          provider: llm.provider,
          apiKey: llm.apiKey,
          model: llm.model,
          baseUrl: llm.baseUrl,
          requestMode: llm.requestMode,
          extraHeaders: llm.extraHeaders,
          timeoutMs: llm.timeoutMs,
        })
      : undefined,
    thresholds: { ...CONFIDENCE_THRESHOLDS.default, autoAccept: config.autoAcceptThreshold },
    remoteTimeoutMs: llm?.timeoutMs,
    enhancedRules: config.enhancedRules,
    logger,
  });

  logger.info(
    scopedMessage(
      "pipeline",
      `strategies: ${strategies.map((strategy) => strategy.strategy).join(" -> ")}; ` +
        `category model: ${llm ? `${llm.provider}/${llm.model}` : "rules only"}`,
    ),
  );

  const pipeline = new ReceiptPipeline({
    extractor: engine,
    parser,
    classifier,
    classificationDeadlineMs: config.classificationDeadlineMs,
    defaultCurrency: config.defaultCurrency,
    now: options.now,
    logger,
  });

  return { pipeline, engine, parser, classifier, strategies };
}

export function createReceiptPipelineFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: CreateReceiptPipelineOptions = {},
): ReceiptPipelineServices {
  return createReceiptPipeline(readPipelineConfigFromEnv(env), options);
}

export * from "./classifier/category-classifier.js";
export * from "./classifier/classification-cache.js";
export * from "./classifier/keyword-tables.js";
export * from "./classifier/remote-category-client.js";
export * from "./classifier/rule-scoring.js";
export * from "./config/env.js";
export * from "./extraction/extraction-engine.js";
export * from "./extraction/image-preprocessor.js";
export * from "./extraction/isolated-tesseract-extractor.js";
export * from "./extraction/isolated-worker.js";
export * from "./extraction/remote-ocr-extractor.js";
export * from "./extraction/tesseract-recognition.js";
export * from "./extraction/types.js";
export * from "./heuristics/text-heuristics.js";
export * from "./logging/logger.js";
export * from "./parser/date-extraction.js";
export * from "./parser/receipt-parser.js";
export * from "./parser/receipt-validation.js";
export * from "./pipeline/create-pipeline.js";
export * from "./pipeline/receipt-pipeline.js";
export * from "./pipeline/workflow-result.js";
export * from "./util/deadline.js";
export * from "./util/errors.js";
export * from "./util/numbers.js";

import { readFile, stat } from "node:fs/promises";
import type { ExtractionErrorKind, RawTextResult } from "@expense-scan/receipt-contracts";
import { type PipelineLogger, defaultLogger, scopedMessage } from "../logging/logger.js";
import { sleep } from "../util/deadline.js";
import { describeError, isDeadlineExceeded } from "../util/errors.js";
import { prepareReceiptImage } from "./image-preprocessor.js";
import {
  type IsolatedTesseractExtractorOptions,
  IsolatedTesseractExtractor,
} from "./isolated-tesseract-extractor.js";
import { type RemoteOcrExtractorOptions, RemoteOcrExtractor } from "./remote-ocr-extractor.js";
import { ExtractionError, type PreparedImage, type TextExtractor } from "./types.js";

export const MANUAL_ENTRY_MESSAGE =
  "Text extraction is currently unavailable. Please enter receipt details manually or try again later.";

export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;
export const DEFAULT_RETRY_BACKOFF_MS = 500;
const RETRY_SKIP_THRESHOLD = 2;

export type ExtractionChainConfig = {
  tesseract?: IsolatedTesseractExtractorOptions;
  /** The remote strategy joins the chain only when an API key is set. */
  remoteOcr?: Partial<RemoteOcrExtractorOptions>;
};

export function buildExtractionChain(config: ExtractionChainConfig = {}): TextExtractor[] {
  const chain: TextExtractor[] = [new IsolatedTesseractExtractor(config.tesseract)];
  const apiKey = config.remoteOcr?.apiKey?.trim();
  if (apiKey) {
    chain.push(new RemoteOcrExtractor({ ...config.remoteOcr, apiKey }));
  }
  return chain;
}

export type TextExtractionEngineOptions = {
  /** First entry is the primary strategy and gets the single retry. */
  strategies: readonly TextExtractor[];
  maxFileBytes?: number;
  retryBackoffMs?: number;
  prepareImage?: (input: Buffer) => Promise<Buffer>;
  logger?: PipelineLogger;
};

type Failure = { kind: ExtractionErrorKind; message: string };
type Attempt = { ok: true; result: RawTextResult } | { ok: false; failure: Failure };

export class TextExtractionEngine {
  private readonly strategies: readonly TextExtractor[];
  private readonly maxFileBytes: number;
  private readonly retryBackoffMs: number;
  private readonly prepareImage: (input: Buffer) => Promise<Buffer>;
  private readonly logger: PipelineLogger;
  private primaryFailures = 0;

  constructor(options: TextExtractionEngineOptions) {
    this.strategies = options.strategies;
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.prepareImage = options.prepareImage ?? ((input) => prepareReceiptImage(input));
    this.logger = options.logger ?? defaultLogger;
  }

  /** Primary failures since the last primary success, across calls. */
  get consecutivePrimaryFailures(): number {
    return this.primaryFailures;
  }

  async extract(imagePath: string): Promise<RawTextResult> {
    let image: PreparedImage;
    try {
      image = await this.loadImage(imagePath);
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(scopedMessage("extraction", `${imagePath} rejected: ${failure.message}`));
      return failedResult(failure);
    }

    try {
      return await this.runChain(image);
    } catch (error) {
      const failure = toFailure(error);
      this.logger.error(
        scopedMessage("extraction", `strategy chain crashed for ${imagePath}: ${failure.message}`),
      );
      return manualEntryResult(failure);
    }
  }

  private async loadImage(imagePath: string): Promise<PreparedImage> {
    const info = await stat(imagePath).catch((error: unknown) => {
      throw new ExtractionError("not_found", `image not found: ${imagePath}`, { cause: error });
    });
    if (!info.isFile()) {
      throw new ExtractionError("not_found", `image is not a file: ${imagePath}`);
    }
    if (info.size > this.maxFileBytes) {
      throw new ExtractionError(
        "too_large",
        `image is ${info.size} bytes, above the ${this.maxFileBytes} byte limit`,
      );
    }

    const buffer = await this.prepareImage(await readFile(imagePath));
    return { path: imagePath, buffer };
  }

  private async runChain(image: PreparedImage): Promise<RawTextResult> {
    const [primary, ...fallbacks] = this.strategies;
    let lastFailure: Failure = {
      kind: "engine_failure",
      message: "no extraction strategy is configured",
    };

    if (primary) {
      const outcome = await this.runPrimary(primary, image);
      if (outcome.ok) {
        return outcome.result;
      }
      lastFailure = outcome.failure;
    }

    for (const strategy of fallbacks) {
      const outcome = await this.attempt(strategy, image);
      if (outcome.ok) {
        return outcome.result;
      }
      lastFailure = outcome.failure;
    }

    this.logger.warn(
      scopedMessage("extraction", `all strategies failed for ${image.path}; manual entry required`),
    );
    return manualEntryResult(lastFailure);
  }

  private async runPrimary(primary: TextExtractor, image: PreparedImage): Promise<Attempt> {
    const first = await this.attempt(primary, image);
    if (first.ok) {
      this.primaryFailures = 0;
      return first;
    }

    this.primaryFailures += 1;
    if (this.primaryFailures >= RETRY_SKIP_THRESHOLD) {
      this.logger.info(
        scopedMessage(
          "extraction",
          `${primary.strategy} has failed ${this.primaryFailures} times; skipping retry`,
        ),
      );
      return first;
    }

    await sleep(this.retryBackoffMs);
    const retry = await this.attempt(primary, image);
    if (retry.ok) {
      this.primaryFailures = 0;
      return retry;
    }
    this.primaryFailures += 1;
    return retry;
  }

  private async attempt(strategy: TextExtractor, image: PreparedImage): Promise<Attempt> {
    try {
      const result = await strategy.extract(image);
      if (result.text.trim().length === 0) {
        throw new ExtractionError("no_text_found", `${strategy.strategy} found no text`);
      }
      return { ok: true, result: { ...result, strategy: strategy.strategy } };
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(
        scopedMessage("extraction", `${strategy.strategy} failed (${failure.kind}): ${failure.message}`),
      );
      return { ok: false, failure };
    }
  }
}

function toFailure(error: unknown): Failure {
  if (error instanceof ExtractionError) {
    return { kind: error.kind, message: error.message };
  }
  if (isDeadlineExceeded(error)) {
    return { kind: "timeout", message: error.message };
  }
  return { kind: "engine_failure", message: describeError(error) };
}

function failedResult(failure: Failure): RawTextResult {
  return {
    succeeded: false,
    text: "",
    blocks: [],
    errorKind: failure.kind,
    errorMessage: failure.message,
  };
}

function manualEntryResult(lastFailure: Failure): RawTextResult {
  return {
    succeeded: false,
    text: "",
    blocks: [],
    errorKind: lastFailure.kind,
    errorMessage: `${MANUAL_ENTRY_MESSAGE} (last error: ${lastFailure.message})`,
    strategy: "manual_entry",
  };
}

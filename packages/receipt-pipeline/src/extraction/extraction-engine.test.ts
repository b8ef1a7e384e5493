import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { RawTextResult } from "@expense-scan/receipt-contracts";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PipelineLogger } from "../logging/logger.js";
import { DeadlineExceededError } from "../util/errors.js";
import {
  MANUAL_ENTRY_MESSAGE,
  TextExtractionEngine,
  buildExtractionChain,
} from "./extraction-engine.js";
import { ExtractionError, type PreparedImage, type TextExtractor } from "./types.js";

function createLogger(): PipelineLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function textResult(text: string, confidence = 0.9): RawTextResult {
  return { succeeded: true, text, blocks: [], confidence };
}

function fakeStrategy(strategy: TextExtractor["strategy"], outcomes: Array<RawTextResult | Error>) {
  const extract = vi.fn(async (_image: PreparedImage): Promise<RawTextResult> => {
    const next = outcomes.shift();
    if (!next) {
      throw new Error(`${strategy} has no scripted outcome left`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
  const extractor: TextExtractor = { strategy, extract };
  return { extractor, extract };
}

let workDir: string;
let receiptPath: string;

beforeEach(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), "receipt-extraction-"));
  receiptPath = path.join(workDir, "receipt.jpg");
  await writeFile(receiptPath, Buffer.from("fake image bytes"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

function createEngine(strategies: TextExtractor[], maxFileBytes?: number) {
  return new TextExtractionEngine({
    strategies,
    maxFileBytes,
    retryBackoffMs: 0,
    prepareImage: async (input) => input,
    logger: createLogger(),
  });
}

describe("TextExtractionEngine", () => {
  it("reports missing files without running any strategy", async () => {
    const primary = fakeStrategy("isolated_tesseract", [textResult("unused")]);
    const engine = createEngine([primary.extractor]);

    const result = await engine.extract(path.join(workDir, "missing.jpg"));

    expect(result.succeeded).toBe(false);
    expect(result.errorKind).toBe("not_found");
    expect(result.strategy).toBeUndefined();
    expect(primary.extract).not.toHaveBeenCalled();
  });

  it("rejects files above the size limit", async () => {
    const primary = fakeStrategy("isolated_tesseract", [textResult("unused")]);
    const engine = createEngine([primary.extractor], 8);

    const result = await engine.extract(receiptPath);

    expect(result.errorKind).toBe("too_large");
    expect(result.errorMessage).toBe("image is 16 bytes, above the 8 byte limit");
    expect(primary.extract).not.toHaveBeenCalled();
  });

  it("returns the primary result tagged with its strategy", async () => {
    const primary = fakeStrategy("isolated_tesseract", [textResult("WALMART\nTOTAL 45.67", 0.85)]);
    const engine = createEngine([primary.extractor]);

    const result = await engine.extract(receiptPath);

    expect(result).toEqual({
      succeeded: true,
      text: "WALMART\nTOTAL 45.67",
      blocks: [],
      confidence: 0.85,
      strategy: "isolated_tesseract",
    });
    expect(primary.extract.mock.calls[0]?.[0]).toEqual({
      path: receiptPath,
      buffer: Buffer.from("fake image bytes"),
    });
  });

  it("retries the primary strategy once after a failure", async () => {
    const primary = fakeStrategy("isolated_tesseract", [
      new DeadlineExceededError("tesseract recognition", 8000),
      textResult("CORNER CAFE"),
    ]);
    const engine = createEngine([primary.extractor]);

    const result = await engine.extract(receiptPath);

    expect(result.text).toBe("CORNER CAFE");
    expect(primary.extract).toHaveBeenCalledTimes(2);
    expect(engine.consecutivePrimaryFailures).toBe(0);
  });

  it("falls back to remote ocr and then to manual entry when every strategy fails", async () => {
    const primary = fakeStrategy("isolated_tesseract", [
      new DeadlineExceededError("tesseract recognition", 8000),
      new DeadlineExceededError("tesseract recognition", 8000),
    ]);
    const remote = fakeStrategy("remote_ocr", [
      new ExtractionError("too_large", "image is still too large to upload"),
    ]);
    const engine = createEngine([primary.extractor, remote.extractor]);

    const result = await engine.extract(receiptPath);

    expect(primary.extract).toHaveBeenCalledTimes(2);
    expect(remote.extract).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      succeeded: false,
      text: "",
      blocks: [],
      errorKind: "too_large",
      errorMessage: `${MANUAL_ENTRY_MESSAGE} (last error: image is still too large to upload)`,
      strategy: "manual_entry",
    });
    expect(engine.consecutivePrimaryFailures).toBe(2);
  });

  it("skips the retry once the primary strategy keeps failing", async () => {
    const timeout = () => new DeadlineExceededError("tesseract recognition", 8000);
    const primary = fakeStrategy("isolated_tesseract", [timeout(), timeout(), timeout()]);
    const remote = fakeStrategy("remote_ocr", [
      new ExtractionError("engine_failure", "remote ocr request failed (503): down"),
      textResult("FRESH MARKET", 0.8),
    ]);
    const engine = createEngine([primary.extractor, remote.extractor]);

    await engine.extract(receiptPath);
    const second = await engine.extract(receiptPath);

    expect(primary.extract).toHaveBeenCalledTimes(3);
    expect(remote.extract).toHaveBeenCalledTimes(2);
    expect(second.strategy).toBe("remote_ocr");
    expect(second.text).toBe("FRESH MARKET");
    expect(engine.consecutivePrimaryFailures).toBe(3);
  });

  it("treats whitespace-only text as a failure", async () => {
    const primary = fakeStrategy("isolated_tesseract", [textResult("  \n "), textResult("\t")]);
    const engine = createEngine([primary.extractor]);

    const result = await engine.extract(receiptPath);

    expect(result.succeeded).toBe(false);
    expect(result.errorKind).toBe("no_text_found");
    expect(result.strategy).toBe("manual_entry");
  });

  it("classifies unexpected strategy errors as engine failures", async () => {
    const primary = fakeStrategy("isolated_tesseract", [
      new Error("wasm module crashed"),
      new Error("wasm module crashed"),
    ]);
    const engine = createEngine([primary.extractor]);

    const result = await engine.extract(receiptPath);

    expect(result.errorKind).toBe("engine_failure");
    expect(result.errorMessage).toContain("wasm module crashed");
  });

  it("ends in manual entry when no strategy is configured", async () => {
    const result = await createEngine([]).extract(receiptPath);

    expect(result.strategy).toBe("manual_entry");
    expect(result.errorKind).toBe("engine_failure");
  });
});

describe("buildExtractionChain", () => {
  it("uses only the isolated tesseract strategy without an ocr api key", () => {
    expect(buildExtractionChain().map((strategy) => strategy.strategy)).toEqual([
      "isolated_tesseract",
    ]);
    expect(
      buildExtractionChain({ remoteOcr: { apiKey: "  " } }).map((strategy) => strategy.strategy),
    ).toEqual(["isolated_tesseract"]);
  });

  it("appends remote ocr when an api key is configured", () => {
    expect(
      buildExtractionChain({ remoteOcr: { apiKey: "test-secret" } }).map(
        (strategy) => strategy.strategy,
      ),
    ).toEqual(["isolated_tesseract", "remote_ocr"]);
  });
});

import { type RawTextResult, RemoteOcrResponseSchema } from "@expense-scan/receipt-contracts";
import { DeadlineExceededError } from "../util/errors.js";
import { type PayloadEncodeOptions, encodeUnderCeiling } from "./image-preprocessor.js";
import { ExtractionError, type PreparedImage, type TextExtractor } from "./types.js";

export type RemoteOcrExtractorOptions = {
  apiKey: string;
  baseUrl?: string;
  language?: string;
  deadlineMs?: number;
  payload?: PayloadEncodeOptions;
};

export const DEFAULT_REMOTE_OCR_URL = "https://api.ocr.space/parse/image";
export const DEFAULT_REMOTE_OCR_DEADLINE_MS = 30_000;

// The service reports no per-line confidence.
const REMOTE_OCR_CONFIDENCE = 0.8;

export class RemoteOcrExtractor implements TextExtractor {
  readonly strategy = "remote_ocr" as const;

  private readonly apiKey: string;
  private readonly url: string;
  private readonly language: string;
  private readonly deadlineMs: number;
  private readonly payload: PayloadEncodeOptions;

  constructor(options: RemoteOcrExtractorOptions) {
    this.apiKey = options.apiKey.trim();
    this.url = options.baseUrl?.trim() || DEFAULT_REMOTE_OCR_URL;
    this.language = options.language?.trim() || "eng";
    this.deadlineMs = options.deadlineMs ?? DEFAULT_REMOTE_OCR_DEADLINE_MS;
    this.payload = options.payload ?? {};
  }

  async extract(image: PreparedImage): Promise<RawTextResult> {
    const encoded = await encodeUnderCeiling(image.buffer, this.payload);
    const form = new URLSearchParams({
      apikey: this.apiKey,
      base64Image: `data:image/jpeg;base64,${encoded.toString("base64")}`,
      language: this.language,
      isOverlayRequired: "false",
      detectOrientation: "true",
      scale: "true",
      OCREngine: "2",
    });

    const body = await this.post(form);
    const parsed = RemoteOcrResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionError("engine_failure", "remote ocr returned an unexpected payload");
    }

    const payload = parsed.data;
    if (payload.IsErroredOnProcessing) {
      throw new ExtractionError(
        "engine_failure",
        `remote ocr failed: ${firstErrorMessage(payload.ErrorMessage) ?? "unknown error"}`,
      );
    }

    const text = (payload.ParsedResults ?? [])
      .map((result) => result.ParsedText ?? "")
      .join("\n")
      .replace(/\r\n?/g, "\n")
      .trim();
    if (text.length === 0) {
      throw new ExtractionError("no_text_found", "remote ocr found no text in the image");
    }

    return {
      succeeded: true,
      text,
      blocks: [],
      confidence: REMOTE_OCR_CONFIDENCE,
      strategy: "remote_ocr",
    };
  }

  private async post(form: URLSearchParams): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.deadlineMs);

    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: form.toString(),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ExtractionError(
          "engine_failure",
          `remote ocr request failed (${response.status}): ${text.slice(0, 200)}`,
        );
      }
      return await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new DeadlineExceededError("remote ocr", this.deadlineMs);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}

function firstErrorMessage(value: string | string[] | null | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value ?? undefined;
}

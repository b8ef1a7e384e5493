import type { RawTextResult } from "@expense-scan/receipt-contracts";
import { type IsolatedTaskEntry, runIsolatedTask } from "./isolated-worker.js";
import {
  type TesseractJob,
  TesseractReplySchema,
  summarizeRecognition,
} from "./tesseract-recognition.js";
import { resolveBundledLangPath, tesseractWorkerEntry } from "./tesseract-worker.js";
import { ExtractionError, type PreparedImage, type TextExtractor } from "./types.js";

export type IsolatedTesseractExtractorOptions = {
  deadlineMs?: number;
  lang?: string;
  /** Directory holding `<lang>.traineddata.gz`; defaults to the installed `@tesseract.js-data/<lang>` package. */
  langPath?: string;
  /** Worker to run instead of the bundled tesseract entry. */
  entry?: IsolatedTaskEntry;
};

export const DEFAULT_PRIMARY_DEADLINE_MS = 8000;

export class IsolatedTesseractExtractor implements TextExtractor {
  readonly strategy = "isolated_tesseract" as const;

  private readonly deadlineMs: number;
  private readonly lang: string;
  private readonly langPath?: string;
  private readonly entry: IsolatedTaskEntry;

  constructor(options: IsolatedTesseractExtractorOptions = {}) {
    this.deadlineMs = options.deadlineMs ?? DEFAULT_PRIMARY_DEADLINE_MS;
    this.lang = options.lang?.trim() || "eng";
    this.langPath = options.langPath?.trim() || resolveBundledLangPath(this.lang);
    this.entry = options.entry ?? tesseractWorkerEntry();
  }

  async extract(image: PreparedImage): Promise<RawTextResult> {
    if (!this.langPath) {
      throw new ExtractionError(
        "engine_failure",
        `no traineddata installed for ${this.lang}; add @tesseract.js-data/${this.lang} or set a langPath`,
      );
    }
    const job: TesseractJob = { image: image.buffer, lang: this.lang, langPath: this.langPath };
    const reply = TesseractReplySchema.safeParse(
      await runIsolatedTask({
        entry: this.entry,
        workerData: job,
        deadlineMs: this.deadlineMs,
        label: "tesseract recognition",
      }),
    );

    if (!reply.success) {
      throw new ExtractionError("engine_failure", "tesseract worker sent an unrecognized reply");
    }
    if (!reply.data.ok) {
      throw new ExtractionError(
        "engine_failure",
        `tesseract recognition failed: ${reply.data.message}`,
      );
    }
    return summarizeRecognition(reply.data.text, reply.data.confidence, reply.data.lines);
  }
}

import type {
  ExtractionErrorKind,
  ExtractionStrategy,
  RawTextResult,
} from "@expense-scan/receipt-contracts";

/** Image bytes after preparation, plus the path they were read from. */
export type PreparedImage = {
  path: string;
  buffer: Buffer;
};

/**
 * One strategy in the extraction chain. Implementations throw on failure;
 * the engine turns the thrown value into an error kind.
 */
export type TextExtractor = {
  readonly strategy: Exclude<ExtractionStrategy, "manual_entry">;
  extract: (image: PreparedImage) => Promise<RawTextResult>;
};

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
    this.kind = kind;
  }
}

import type { RawTextResult, TextBlock } from "@expense-scan/receipt-contracts";
import { z } from "zod";
import { clamp, roundTo } from "../util/numbers.js";

export type TesseractJob = {
  image: Uint8Array;
  lang: string;
  langPath?: string;
};

const RecognizedLineSchema = z.object({
  text: z.string(),
  confidence: z.number(),
  bbox: z
    .object({ x0: z.number(), y0: z.number(), x1: z.number(), y1: z.number() })
    .optional(),
});

export const TesseractReplySchema = z.discriminatedUnion("ok", [
  z.object({
    ok: z.literal(true),
    text: z.string(),
    confidence: z.number(),
    lines: z.array(RecognizedLineSchema),
  }),
  z.object({ ok: z.literal(false), message: z.string() }),
]);

export type RecognizedLine = z.infer<typeof RecognizedLineSchema>;
export type TesseractReply = z.infer<typeof TesseractReplySchema>;

/**
 * Builds a raw text result from a recognition pass. Tesseract reports
 * confidences on a 0-100 scale; the result carries the mean line confidence
 * on 0-1, or the page confidence when no lines came back.
 */
export function summarizeRecognition(
  text: string,
  pageConfidence: number,
  lines: readonly RecognizedLine[],
): RawTextResult {
  const kept = lines.filter((line) => line.text.trim().length > 0);
  const blocks: TextBlock[] = kept.map((line) => ({
    text: line.text.trim(),
    lines: [line.text.trim()],
    ...(line.bbox
      ? {
          boundingBox: {
            x: line.bbox.x0,
            y: line.bbox.y0,
            width: Math.max(0, line.bbox.x1 - line.bbox.x0),
            height: Math.max(0, line.bbox.y1 - line.bbox.y0),
          },
        }
      : {}),
    confidence: normalizeConfidence(line.confidence),
  }));

  const confidence =
    kept.length > 0
      ? roundTo(kept.reduce((sum, line) => sum + normalizeConfidence(line.confidence), 0) / kept.length, 4)
      : normalizeConfidence(pageConfidence);

  return {
    succeeded: true,
    text: text.replace(/\r\n?/g, "\n").trim(),
    blocks,
    confidence,
    strategy: "isolated_tesseract",
  };
}

function normalizeConfidence(value: number): number {
  return roundTo(clamp(value / 100), 4);
}

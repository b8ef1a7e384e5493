import sharp from "sharp";
import { ExtractionError } from "./types.js";

export type ReceiptImagePrepareOptions = {
  passThroughBytes?: number;
  maxLongestSide?: number;
  jpegQuality?: number;
};

export type PayloadEncodeOptions = {
  ceilingBytes?: number;
  maxLongestSide?: number;
  startQuality?: number;
  floorQuality?: number;
  qualityStep?: number;
};

const DEFAULT_PASS_THROUGH_BYTES = 1024 * 1024;
const DEFAULT_MAX_LONGEST_SIDE = 1600;
const DEFAULT_JPEG_QUALITY = 75;

const DEFAULT_PAYLOAD_CEILING_BYTES = 900 * 1024;
const DEFAULT_PAYLOAD_LONGEST_SIDE = 1200;

/**
 * Shrinks large captures before recognition. Small files, and files sharp
 * cannot decode, are returned untouched so the strategies can report on them.
 */
export async function prepareReceiptImage(
  input: Buffer,
  options: ReceiptImagePrepareOptions = {},
): Promise<Buffer> {
  const passThroughBytes = options.passThroughBytes ?? DEFAULT_PASS_THROUGH_BYTES;
  if (input.length < passThroughBytes) {
    return input;
  }

  const maxLongestSide = options.maxLongestSide ?? DEFAULT_MAX_LONGEST_SIDE;
  const jpegQuality = options.jpegQuality ?? DEFAULT_JPEG_QUALITY;

  try {
    return await sharp(input)
      .rotate()
      .resize({
        width: maxLongestSide,
        height: maxLongestSide,
        fit: "inside",
        withoutEnlargement: true,
      })
      .jpeg({ quality: jpegQuality, mozjpeg: true })
      .toBuffer();
  } catch {
    return input;
  }
}

/**
 * Re-encodes an image as JPEG with decreasing quality until it fits the
 * upload ceiling. Images already under the ceiling are sent as they are.
 */
export async function encodeUnderCeiling(
  input: Buffer,
  options: PayloadEncodeOptions = {},
): Promise<Buffer> {
  const ceilingBytes = options.ceilingBytes ?? DEFAULT_PAYLOAD_CEILING_BYTES;
  if (input.length < ceilingBytes) {
    return input;
  }

  const maxLongestSide = options.maxLongestSide ?? DEFAULT_PAYLOAD_LONGEST_SIDE;
  const floorQuality = options.floorQuality ?? 50;
  const qualityStep = options.qualityStep ?? 10;

  let resized: Buffer;
  try {
    resized = await sharp(input)
      .rotate()
      .resize({
        width: maxLongestSide,
        height: maxLongestSide,
        fit: "inside",
        withoutEnlargement: true,
      })
      .toBuffer();
  } catch (error) {
    throw new ExtractionError("engine_failure", "image could not be decoded for upload", {
      cause: error,
    });
  }

  let smallest = Number.POSITIVE_INFINITY;
  for (
    let quality = options.startQuality ?? 85;
    quality >= floorQuality;
    quality -= qualityStep
  ) {
    const encoded = await sharp(resized).jpeg({ quality, mozjpeg: true }).toBuffer();
    if (encoded.length <= ceilingBytes) {
      return encoded;
    }
    smallest = Math.min(smallest, encoded.length);
  }

  throw new ExtractionError(
    "too_large",
    `image is ${smallest} bytes at the lowest quality, above the ${ceilingBytes} byte upload limit`,
  );
}

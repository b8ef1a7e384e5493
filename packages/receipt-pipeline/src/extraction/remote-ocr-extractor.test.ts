import sharp from "sharp";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DeadlineExceededError } from "../util/errors.js";
import { RemoteOcrExtractor } from "./remote-ocr-extractor.js";
import { ExtractionError, type PreparedImage } from "./types.js";

type CapturedRequest = { url: string; init?: RequestInit };

const image: PreparedImage = { path: "/receipts/cafe.jpg", buffer: Buffer.from([1, 2, 3]) };

function stubFetch(response: () => Response): CapturedRequest[] {
  const requests: CapturedRequest[] = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
      requests.push({ url: String(url), init });
      return response();
    }),
  );
  return requests;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

async function kindOf(promise: Promise<unknown>): Promise<string | undefined> {
  const failure = await promise.catch((error: unknown) => error);
  return failure instanceof ExtractionError ? failure.kind : undefined;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("RemoteOcrExtractor", () => {
  it("posts a form-encoded base64 image and returns the parsed text", async () => {
    const requests = stubFetch(() =>
      jsonResponse({
        ParsedResults: [{ ParsedText: "CORNER CAFE\r\nTOTAL 8.40\r\n" }],
        IsErroredOnProcessing: false,
      }),
    );
    const extractor = new RemoteOcrExtractor({ apiKey: " test-secret " });

    const result = await extractor.extract(image);

    expect(result).toEqual({
      succeeded: true,
      text: "CORNER CAFE\nTOTAL 8.40",
      blocks: [],
      confidence: 0.8,
      strategy: "remote_ocr",
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://api.ocr.space/parse/image");

    const form = new URLSearchParams(String(requests[0]?.init?.body));
    expect(form.get("apikey")).toBe("test-secret");
    expect(form.get("base64Image")).toBe("data:image/jpeg;base64,AQID");
    expect(form.get("language")).toBe("eng");
    expect(form.get("OCREngine")).toBe("2");
  });

  it("reports processing errors from the service", async () => {
    stubFetch(() =>
      jsonResponse({ IsErroredOnProcessing: true, ErrorMessage: ["E101: invalid key"] }),
    );
    const extractor = new RemoteOcrExtractor({ apiKey: "test-secret" });

    await expect(extractor.extract(image)).rejects.toThrow("remote ocr failed: E101: invalid key");
  });

  it("treats whitespace-only text as no text found", async () => {
    stubFetch(() => jsonResponse({ ParsedResults: [{ ParsedText: " \r\n " }] }));
    const extractor = new RemoteOcrExtractor({ apiKey: "test-secret" });

    expect(await kindOf(extractor.extract(image))).toBe("no_text_found");
  });

  it("reports non-2xx responses with the status", async () => {
    stubFetch(() => new Response("upstream unavailable", { status: 503 }));
    const extractor = new RemoteOcrExtractor({ apiKey: "test-secret" });

    await expect(extractor.extract(image)).rejects.toThrow(
      "remote ocr request failed (503): upstream unavailable",
    );
  });

  it("rejects payloads that do not match the response shape", async () => {
    stubFetch(() => jsonResponse({ ParsedResults: "not a list" }));
    const extractor = new RemoteOcrExtractor({ apiKey: "test-secret" });

    await expect(extractor.extract(image)).rejects.toThrow(
      "remote ocr returned an unexpected payload",
    );
  });

  it("aborts the request at its own deadline", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      ),
    );
    const extractor = new RemoteOcrExtractor({ apiKey: "test-secret", deadlineMs: 20 });

    const failure = await extractor.extract(image).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(DeadlineExceededError);
    expect(failure instanceof Error ? failure.message : "").toBe("remote ocr timed out after 20ms");
  });

  it("refuses to upload images that stay above the payload ceiling", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const buffer = await sharp({
      create: { width: 200, height: 200, channels: 3, background: { r: 10, g: 10, b: 10 } },
    })
      .png()
      .toBuffer();
    const extractor = new RemoteOcrExtractor({
      apiKey: "test-secret",
      payload: { ceilingBytes: 10 },
    });

    expect(await kindOf(extractor.extract({ path: "/receipts/big.png", buffer }))).toBe(
      "too_large",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

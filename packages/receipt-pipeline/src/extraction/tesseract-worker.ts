import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import type { createWorker } from "tesseract.js";
import type { IsolatedTaskEntry } from "./isolated-worker.js";
import type { TesseractJob, TesseractReply } from "./tesseract-recognition.js";

export type TesseractWorkerScope = {
  port: { postMessage: (reply: TesseractReply) => void };
  job: TesseractJob;
  tesseract: { createWorker: typeof createWorker };
};

/**
 * Recognition body run on the isolated thread. It is shipped to the worker
 * as source text, so it must only touch its argument and globals.
 */
export async function recognizeOnWorkerThread(scope: TesseractWorkerScope): Promise<void> {
  try {
    const worker = await scope.tesseract.createWorker(scope.job.lang, 1, {
      cacheMethod: "none",
      ...(scope.job.langPath ? { langPath: scope.job.langPath } : {}),
    });
    try {
      const { data } = await worker.recognize(Buffer.from(scope.job.image));
      scope.port.postMessage({
        ok: true,
        text: data.text,
        confidence: data.confidence,
        lines: data.lines.map((line) => ({
          text: line.text,
          confidence: line.confidence,
          bbox: line.bbox,
        })),
      });
    } finally {
      await worker.terminate();
    }
  } catch (error) {
    scope.port.postMessage({
      ok: false,
      message: error instanceof Error ? error.message : String(error),
    });
  }
}

const requireFromHere = createRequire(import.meta.url);

/** Directory of the traineddata files installed with `@tesseract.js-data/<lang>`. */
export function resolveBundledLangPath(lang: string): string | undefined {
  try {
    const manifest = requireFromHere.resolve(`@tesseract.js-data/${lang}/package.json`);
    return join(dirname(manifest), "4.0.0_best_int");
  } catch {
    return undefined;
  }
}

/**
 * Worker entry that runs from source and from build output alike: the body
 * travels as eval code and loads tesseract.js from this package's resolution.
 */
export function tesseractWorkerEntry(): IsolatedTaskEntry {
  const tesseractModule = JSON.stringify(requireFromHere.resolve("tesseract.js"));
  return {
    code: [
      'const { parentPort, workerData } = require("node:worker_threads");',
      `const tesseract = require(${tesseractModule});`,
      `(${recognizeOnWorkerThread.toString()})({ port: parentPort, job: workerData, tesseract });`,
    ].join("\n"),
  };
}

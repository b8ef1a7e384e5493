import { Worker } from "node:worker_threads";
import { DeadlineExceededError } from "../util/errors.js";

/** CommonJS source evaluated on the worker thread. */
export type IsolatedTaskEntry = { code: string };

export type IsolatedTaskOptions = {
  entry: IsolatedTaskEntry;
  workerData?: unknown;
  deadlineMs: number;
  label: string;
};

/**
 * Runs one task on a dedicated worker thread and resolves with the first
 * message it posts. The worker is terminated whether it replies, fails or
 * misses the deadline, and the promise settles only once it is gone.
 */
export function runIsolatedTask(options: IsolatedTaskOptions): Promise<unknown> {
  const { entry, workerData, deadlineMs, label } = options;
  const worker = new Worker(entry.code, { eval: true, workerData });

  return new Promise((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      worker.terminate().then(settle, settle);
    };

    const timer = setTimeout(() => {
      finish(() => reject(new DeadlineExceededError(label, deadlineMs)));
    }, deadlineMs);

    worker.once("message", (message: unknown) => {
      finish(() => resolve(message));
    });
    worker.on("error", (error: Error) => {
      finish(() => reject(new Error(`${label} worker failed: ${error.message}`, { cause: error })));
    });
    worker.once("exit", (code: number) => {
      finish(() => reject(new Error(`${label} worker exited with code ${code} before replying`)));
    });
  });
}

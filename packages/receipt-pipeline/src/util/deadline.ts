import { DeadlineExceededError } from "./errors.js";

/**
 * Races `task` against a timer. The task keeps running after the deadline;
 * callers that own a cancellable resource pass `onTimeout` to release it.
 */
export async function withDeadline<T>(
  task: Promise<T>,
  deadlineMs: number,
  label: string,
  onTimeout?: () => void,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new DeadlineExceededError(label, deadlineMs));
    }, deadlineMs);
  });

  try {
    return await Promise.race([task, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return;
  }

  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

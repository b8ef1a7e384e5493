export class DeadlineExceededError extends Error {
  readonly deadlineMs: number;

  constructor(label: string, deadlineMs: number) {
    super(`${label} timed out after ${deadlineMs}ms`);
    this.name = "DeadlineExceededError";
    this.deadlineMs = deadlineMs;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isDeadlineExceeded(error: unknown): error is DeadlineExceededError {
  return error instanceof DeadlineExceededError;
}

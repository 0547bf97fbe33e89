/** Raised when an operation does not settle within its allotted time. */
export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race `operation` against a timer. The operation itself is not cancelled:
 * it keeps running to completion, only the caller stops waiting for it.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label = 'Operation',
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

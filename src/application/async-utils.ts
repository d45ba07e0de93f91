export class TimeoutError extends Error {
  constructor(readonly operation: string, readonly ms: number) {
    super(`${operation} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `task` and rejects with `TimeoutError` if it has not settled
 * within `ms`. A synchronous throw from `task` becomes a rejection.
 * The task itself is not cancelled.
 */
export async function withTimeout<T>(
  task: () => T | Promise<T>,
  ms: number,
  operation: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
    timer.unref();
  });

  try {
    return await Promise.race([Promise.resolve().then(task), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

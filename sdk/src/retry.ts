export async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  maxAttempts: number,
  backoffMs: number,
  isRetryable: (error: unknown) => boolean = () => true
): Promise<T> {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer: ${maxAttempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxAttempts || !isRetryable(error)) throw error;
      await sleep(backoffMs * 2 ** (attempt - 1));
    }
  }
}

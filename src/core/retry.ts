/**
 * Run an async operation over a fixed, ordered schedule of attempt starts.
 *
 * Attempt 1 starts immediately and attempt i + 1 starts `scheduleMs[i - 1]`
 * after attempt i started, so a schedule of N delays allows N + 1 attempts.
 * Earlier attempts stay in flight while later ones start; the first attempt to
 * succeed settles the result. A failure rejected by `shouldRetry` propagates
 * immediately. Once every attempt has started and failed, the failure that
 * arrived last is rethrown.
 */

export interface RetryOptions {
  shouldRetry?: (error: unknown, attempt: number) => boolean;
}

export function withRetries<T>(
  operation: (attempt: number) => Promise<T>,
  scheduleMs: readonly number[],
  options: RetryOptions = {},
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? (() => true);
  const totalAttempts = scheduleMs.length + 1;

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let started = 0;
    let failed = 0;
    let nextStart: ReturnType<typeof setTimeout> | undefined;

    const settle = () => {
      settled = true;
      clearTimeout(nextStart);
    };

    const start = () => {
      if (settled) return;
      const attempt = ++started;
      const delayMs = scheduleMs[attempt - 1];
      if (delayMs !== undefined) nextStart = setTimeout(start, delayMs);

      Promise.resolve()
        .then(() => operation(attempt))
        .then(
          (value) => {
            if (settled) return;
            settle();
            resolve(value);
          },
          (error: unknown) => {
            if (settled) return;
            failed++;
            if (!shouldRetry(error, attempt) || failed === totalAttempts) {
              settle();
              reject(error);
            }
          },
        );
    };

    start();
  });
}

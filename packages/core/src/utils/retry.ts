export type RetryPolicy = {
  /** Retries after the first attempt (0 disables retrying). */
  retries: number;
  /** Delay before the first retry; doubles for each further retry. */
  baseDelayMs: number;
  /** Upper bound for a single delay. */
  maxDelayMs: number;
  /** Random jitter factor between 0 and 1 (default: 0). */
  jitter?: number;
};

export type RetryContext = {
  /** 1-based attempt number */
  attempt: number;
  attempts: number;
};

export type RetryOptions = {
  /** Called before waiting for a retry */
  onRetry?: (error: unknown, info: { attempt: number; attempts: number; delayMs: number }) => void;
  /** Stops further retries; the last error is rethrown */
  signal?: AbortSignal;
};

function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Nominal delays (without jitter) between attempts, e.g. 1s, 2s, 4s
 */
export function backoffSchedule(policy: RetryPolicy): number[] {
  return Array.from({ length: Math.max(0, policy.retries) }, (_, i) =>
    Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** i)
  );
}

function computeDelayMs(policy: RetryPolicy, retry: number): number {
  const nominal = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (retry - 1));
  const jitter = clampNumber(policy.jitter ?? 0, 0, 1);
  const jitterFactor = 1 + (Math.random() * 2 - 1) * jitter; // +/- jitter
  return Math.max(0, Math.round(nominal * jitterFactor));
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return;
  await new Promise<void>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (err: unknown) => boolean,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(0, policy.retries) + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn({ attempt, attempts });
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err) || options.signal?.aborted) {
        throw err;
      }

      const delayMs = computeDelayMs(policy, attempt);
      options.onRetry?.(err, { attempt, attempts, delayMs });
      await sleep(delayMs, options.signal);

      if (options.signal?.aborted) {
        throw err;
      }
    }
  }
}

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffPolicy = {
  baseDelayMs: number;      // delay before the first retry
  maxDelayMs: number;       // cap, applied after jitter
  jitterRatio?: number;     // share of the exponential step added as random jitter, clamped to [0..1]
  randomFn?: () => number;
};

export type RetryOptions = BackoffPolicy & {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const clampUnit = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Delay for the n-th retry (0-based): exponential step plus jitter, capped.
 * Capping after the jitter keeps consecutive delays non-decreasing.
 */
export const computeBackoffDelay = (retryIndex: number, policy: BackoffPolicy, stepOverrideMs?: number): number => {
  const { baseDelayMs, maxDelayMs, jitterRatio = 0.2, randomFn = Math.random } = policy;
  const step = stepOverrideMs ?? baseDelayMs * Math.pow(2, Math.max(0, retryIndex));
  const jitter = Math.floor(step * clampUnit(jitterRatio) * clampUnit(randomFn()));
  return Math.min(maxDelayMs, step + jitter);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, sleep: wait = sleep } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = computeBackoffDelay(attempt, opts, customDelayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await wait(waitMs);
      attempt += 1;
    }
  }
};

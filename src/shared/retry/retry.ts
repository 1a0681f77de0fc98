export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = {
  attempt: number;
  maxAttempts: number;
  elapsedMs: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  deadlineMs?: number;      // overall budget measured from the first attempt
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext & { reason: "not_retryable" | "attempts_exhausted" | "deadline" }) => void;
  randomFn?: () => number;
  nowFn?: () => number;
  sleepFn?: (ms: number) => Promise<void>;
  jitterRatio?: number;
};

export const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } => {
  if (typeof decision === "boolean") return { retry: decision };
  const { retry, delayMs } = decision;
  if (typeof delayMs === "number" && Number.isFinite(delayMs) && delayMs >= 0) {
    return { retry, delayMs };
  }
  return { retry };
};

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "jitterRatio" | "randomFn">,
  customDelayMs?: number
): number => {
  const base = customDelayMs ?? opts.minDelayMs * Math.pow(2, attempt);
  const capped = Math.min(opts.maxDelayMs, base);
  const jitterRatio = Math.min(1, Math.max(0, opts.jitterRatio ?? 0.2));
  const random = Math.min(1, Math.max(0, (opts.randomFn ?? Math.random)()));
  return capped + Math.floor(capped * jitterRatio * random);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    deadlineMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    nowFn = Date.now,
    sleepFn = sleep
  } = opts;

  const startedAt = nowFn();
  const maxAttempts = retries + 1;
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (err) {
      const elapsedMs = nowFn() - startedAt;
      const ctx = { attempt: attempt + 1, maxAttempts, elapsedMs, error: err };
      const decision = normalizeDecision(shouldRetry(err));

      if (!decision.retry) {
        onGiveUp?.({ ...ctx, reason: "not_retryable" });
        throw err;
      }
      if (attempt >= retries) {
        onGiveUp?.({ ...ctx, reason: "attempts_exhausted" });
        throw err;
      }

      let waitMs = computeBackoffMs(attempt, opts, decision.delayMs);
      if (deadlineMs != null) {
        const remainingMs = deadlineMs - elapsedMs;
        if (remainingMs <= 0) {
          onGiveUp?.({ ...ctx, reason: "deadline" });
          throw err;
        }
        // last wait is shortened so the final attempt still lands inside the budget
        waitMs = Math.min(waitMs, remainingMs);
      }

      onRetry?.({ ...ctx, delayMs: waitMs });
      await sleepFn(waitMs);
      attempt += 1;
    }
  }
};

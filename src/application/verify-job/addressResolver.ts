import type { ControlPlaneClient } from "../../ports/ControlPlaneClient";
import { retry, type RetryDecision } from "../../shared/retry/retry";
import { AddressPendingError, AddressResolutionError, toErrorMessage } from "./verification.errors";

export type AddressResolverPolicy = {
  timeoutMs: number;   // overall budget per job
  minDelayMs: number;  // first wait between lookups
  maxDelayMs: number;  // backoff cap
  jitterRatio?: number;
};

export type AddressResolverClock = {
  nowFn?: () => number;
  sleepFn?: (ms: number) => Promise<void>;
  randomFn?: () => number;
};

export interface AddressResolver {
  resolve(controlPlaneUrl: string, jobId: string, region: string): Promise<string>;
}

export const classifyLookupFailure = (err: unknown): RetryDecision => {
  if (err instanceof AddressPendingError) return true;
  if (!(err instanceof Error)) return true;

  if ("terminal" in err && err.terminal === true) return false;
  if ("isTimeout" in err && err.isTimeout === true) return true;

  const status = "status" in err ? err.status : undefined;
  if (status === 429) {
    const delayMs = "retryDelayMs" in err && typeof err.retryDelayMs === "number" ? err.retryDelayMs : undefined;
    return { retry: true, delayMs };
  }
  if (typeof status === "number" && status >= 400 && status < 500) return false;
  return true;
};

/**
 * Polls the operator's control plane until it reports an address for the job,
 * backing off exponentially within a fixed overall deadline.
 */
export class PollingAddressResolver implements AddressResolver {
  constructor(
    private readonly client: ControlPlaneClient,
    private readonly policy: AddressResolverPolicy,
    private readonly clock: AddressResolverClock = {}
  ) {}

  async resolve(controlPlaneUrl: string, jobId: string, region: string): Promise<string> {
    const { timeoutMs, minDelayMs, maxDelayMs, jitterRatio } = this.policy;
    let attempts = 0;
    let elapsedMs = 0;
    let gaveUpOnDeadline = false;

    const lookup = async (): Promise<string> => {
      attempts += 1;
      const address = await this.client.fetchAddress({ controlPlaneUrl, jobId, region });
      if (address == null) throw new AddressPendingError(jobId);
      return address;
    };

    try {
      return await retry(lookup, {
        // at most one attempt per minimum delay within the deadline
        retries: Math.ceil(timeoutMs / minDelayMs),
        minDelayMs,
        maxDelayMs,
        deadlineMs: timeoutMs,
        jitterRatio,
        nowFn: this.clock.nowFn,
        sleepFn: this.clock.sleepFn,
        randomFn: this.clock.randomFn,
        shouldRetry: classifyLookupFailure,
        onRetry: ({ attempt, delayMs, error }) => {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify({
            event: "resolver.retry",
            jobId,
            attempt,
            delayMs,
            reason: toErrorMessage(error)
          }));
        },
        onGiveUp: (ctx) => {
          elapsedMs = ctx.elapsedMs;
          gaveUpOnDeadline = ctx.reason !== "not_retryable";
        }
      });
    } catch (err) {
      throw new AddressResolutionError({
        code: gaveUpOnDeadline ? "resolution_timeout" : "resolution_rejected",
        message: gaveUpOnDeadline
          ? `no address after ${attempts} attempts in ${elapsedMs}ms: ${toErrorMessage(err)}`
          : toErrorMessage(err),
        context: { jobId, attempts, elapsedMs },
        cause: err
      });
    }
  }
}

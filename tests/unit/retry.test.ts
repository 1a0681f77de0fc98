import { retry } from "../../src/shared/retry/retry";

const statusError = (status: number) => Object.assign(new Error("boom"), { status });

const hasServerStatus = (err: unknown): boolean =>
  err instanceof Error && "status" in err && typeof err.status === "number" && err.status >= 500;

describe("retry", () => {
  it("retries transient failures then succeeds", async () => {
    let n = 0;
    const result = await retry(async () => {
      n += 1;
      if (n < 3) {
        throw statusError(503);
      }
      return "ok";
    }, {
      retries: 5,
      minDelayMs: 1,
      maxDelayMs: 5,
      shouldRetry: hasServerStatus
    });

    expect(result).toBe("ok");
    expect(n).toBe(3);
  });

  it("reports attempts_exhausted after the last allowed retry", async () => {
    let attempts = 0;
    const giveUps: string[] = [];

    await expect(retry(async () => {
      attempts += 1;
      throw statusError(502);
    }, {
      retries: 2,
      minDelayMs: 1,
      maxDelayMs: 2,
      shouldRetry: hasServerStatus,
      sleepFn: async () => undefined,
      onGiveUp: ({ reason, attempt, maxAttempts }) => {
        giveUps.push(`${reason}:${attempt}/${maxAttempts}`);
      }
    })).rejects.toThrow("boom");

    expect(attempts).toBe(3);
    expect(giveUps).toEqual(["attempts_exhausted:3/3"]);
  });

  it("reports not_retryable without waiting", async () => {
    const sleepFn = jest.fn(async () => undefined);
    const giveUps: string[] = [];

    await expect(retry(async () => {
      throw statusError(403);
    }, {
      retries: 5,
      minDelayMs: 1,
      maxDelayMs: 2,
      shouldRetry: hasServerStatus,
      sleepFn,
      onGiveUp: ({ reason }) => {
        giveUps.push(reason);
      }
    })).rejects.toThrow("boom");

    expect(sleepFn).not.toHaveBeenCalled();
    expect(giveUps).toEqual(["not_retryable"]);
  });

  it("shortens the last wait to the remaining budget and gives up at the deadline", async () => {
    let now = 0;
    let attempts = 0;
    const waits: number[] = [];
    const giveUps: string[] = [];

    await expect(retry(async () => {
      attempts += 1;
      throw new Error("pending");
    }, {
      retries: 100,
      minDelayMs: 10,
      maxDelayMs: 40,
      deadlineMs: 100,
      jitterRatio: 0,
      shouldRetry: () => true,
      nowFn: () => now,
      sleepFn: async (ms) => {
        waits.push(ms);
        now += ms;
      },
      onGiveUp: ({ reason, elapsedMs }) => {
        giveUps.push(`${reason}@${elapsedMs}`);
      }
    })).rejects.toThrow("pending");

    expect(waits).toEqual([10, 20, 40, 30]);
    expect(attempts).toBe(5);
    expect(giveUps).toEqual(["deadline@100"]);
  });
});

import { buildFailureRecord, type FailureKind } from "../../core/failures/failureRecord";
import type { FailureRepository } from "../../ports/FailureRepository";
import { toErrorMessage } from "./verification.errors";

/**
 * Best-effort writer for failure records. A repository error is logged and
 * swallowed: `record` never rejects and never retries.
 */
export class FailureRecorder {
  constructor(
    private readonly repo: FailureRepository,
    private readonly nowFn: () => number = Date.now
  ) {}

  async record(kind: FailureKind, jobId: string, operator: string, address: string, message: string): Promise<void> {
    const record = buildFailureRecord({ kind, jobId, operator, networkAddress: address, message, nowMs: this.nowFn() });

    try {
      const stored = await this.repo.insert(record);
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "recorder.inserted", kind, jobId, id: stored.id }));
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({
        event: "recorder.insert_failed",
        kind,
        jobId,
        reason: toErrorMessage(err)
      }));
    }
  }
}

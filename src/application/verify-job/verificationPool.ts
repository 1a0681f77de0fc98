import type { JobVerificationTask } from "../../core/jobs/job.types";
import type { Limiter, LimiterStats } from "../../shared/concurrency/limiter";
import type { VerificationReport } from "./jobVerificationWorker";
import { toErrorMessage } from "./verification.errors";

export type VerificationRunner = {
  run(): Promise<VerificationReport>;
};

export type VerificationPool = {
  /** Enqueues the task and returns immediately. */
  dispatch(task: JobVerificationTask): void;
  stats(): LimiterStats;
  /** Resolves once every dispatched verification has finished. */
  drain(): Promise<void>;
};

export const createVerificationPool = (deps: {
  limiter: Limiter;
  createRunner: (task: JobVerificationTask) => VerificationRunner;
}): VerificationPool => {
  const { limiter, createRunner } = deps;

  return {
    dispatch(task) {
      void limiter(() => createRunner(task).run())
        .then((report) => {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify({
            event: "verify.completed",
            jobId: report.jobId,
            address: report.address ?? null,
            failures: report.failures
          }));
        })
        .catch((err: unknown) => {
          // eslint-disable-next-line no-console
          console.error(JSON.stringify({
            event: "verify.crashed",
            jobId: task.jobId,
            reason: toErrorMessage(err)
          }));
        });
    },
    stats: () => limiter.stats(),
    drain: () => limiter.onIdle()
  };
};

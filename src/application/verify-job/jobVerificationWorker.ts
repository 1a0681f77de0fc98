import { UNKNOWN_ADDRESS, type FailureKind } from "../../core/failures/failureRecord";
import type { JobVerificationTask } from "../../core/jobs/job.types";
import type { CrossCheckResult, EndpointCrossChecker } from "../../ports/EndpointCrossChecker";
import type { ProbeOutcome, ReachabilityProbe } from "../../ports/ReachabilityProbe";
import { sleep } from "../../shared/retry/retry";
import type { AddressResolver } from "./addressResolver";
import type { FailureRecorder } from "./failureRecorder";
import { toErrorMessage } from "./verification.errors";

export type VerificationStage =
  | "created"
  | "awaiting_startup"
  | "resolving_address"
  | "probing_reachability"
  | "cross_checking"
  | "done";

export type VerificationReport = {
  jobId: string;
  stage: "done";
  address?: string;
  failures: FailureKind[];
};

export type JobVerificationDeps = {
  resolver: AddressResolver;
  probe: ReachabilityProbe;
  crossChecker: EndpointCrossChecker;
  recorder: FailureRecorder;
  sleepFn?: (ms: number) => Promise<void>;
};

export type JobVerificationOptions = {
  startupDelayMs: number;
};

/**
 * Runs one job through the startup grace period, then address resolution, the
 * reachability probe and the cross-check. A failure at any stage ends in `done`,
 * never in a rejection.
 *
 * A resolution failure ends the run. A failed probe is recorded and the
 * cross-check still runs.
 */
export class JobVerificationWorker {
  private stage: VerificationStage = "created";
  private readonly failures: FailureKind[] = [];

  constructor(
    private readonly task: JobVerificationTask,
    private readonly deps: JobVerificationDeps,
    private readonly options: JobVerificationOptions
  ) {}

  get currentStage(): VerificationStage {
    return this.stage;
  }

  async run(): Promise<VerificationReport> {
    if (this.stage !== "created") {
      throw new Error(`verification for ${this.task.jobId} already started`);
    }

    this.enter("awaiting_startup");
    await (this.deps.sleepFn ?? sleep)(this.options.startupDelayMs);

    this.enter("resolving_address");
    const address = await this.resolveAddress();
    if (address == null) {
      return this.finish();
    }

    this.enter("probing_reachability");
    const probe = await this.probeReachability(address);
    if (!probe.reachable) {
      await this.fail("reachability", address, `Instance reachability test failed: ${probe.reason}`);
    }

    this.enter("cross_checking");
    const crossCheck = await this.crossCheck();
    if (!crossCheck.ok) {
      await this.fail("endpoint", address, crossCheck.message);
    }

    return this.finish(address);
  }

  private async resolveAddress(): Promise<string | undefined> {
    const { controlPlaneUrl, jobId, region } = this.task;
    try {
      return await this.deps.resolver.resolve(controlPlaneUrl, jobId, region);
    } catch (err) {
      await this.fail("reachability", UNKNOWN_ADDRESS, `Failed to get IP address: ${toErrorMessage(err)}`);
      return undefined;
    }
  }

  private async probeReachability(address: string): Promise<ProbeOutcome> {
    try {
      return await this.deps.probe.probe(address);
    } catch (err) {
      return { reachable: false, reason: toErrorMessage(err) };
    }
  }

  private async crossCheck(): Promise<CrossCheckResult> {
    try {
      return await this.deps.crossChecker.check(this.task.jobId);
    } catch (err) {
      return { ok: false, reason: "transport", message: `Failed to call refresh API: ${toErrorMessage(err)}` };
    }
  }

  private async fail(kind: FailureKind, address: string, message: string): Promise<void> {
    this.failures.push(kind);
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "verify.failed",
      jobId: this.task.jobId,
      stage: this.stage,
      kind,
      address,
      message
    }));
    await this.deps.recorder.record(kind, this.task.jobId, this.task.operator, address, message);
  }

  private enter(stage: VerificationStage): void {
    this.stage = stage;
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "verify.stage", jobId: this.task.jobId, stage }));
  }

  private finish(address?: string): VerificationReport {
    this.enter("done");
    return { jobId: this.task.jobId, stage: "done", address, failures: [...this.failures] };
  }
}

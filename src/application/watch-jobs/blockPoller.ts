import type { JobOpenedEvent, JobMetadata, JobVerificationTask } from "../../core/jobs/job.types";
import type { MetadataFilter } from "../../core/jobs/metadataFilter";
import type { BlockRange, JobEventSource } from "../../ports/JobEventSource";
import type { WatermarkStore } from "../../ports/WatermarkStore";
import { toErrorMessage } from "../verify-job/verification.errors";

export type TickFailureStage = "head" | "events" | "operators";

export type TickResult =
  | { status: "idle"; head: number; watermark: number }
  | {
      status: "advanced";
      fromBlock: number;
      toBlock: number;
      events: number;
      dispatched: number;
      skipped: number;
    }
  | { status: "failed"; stage: TickFailureStage; reason: string; watermark: number };

export type BlockPollerDeps = {
  source: JobEventSource;
  filter: MetadataFilter;
  dispatch: (task: JobVerificationTask) => void;
  watermarkStore?: WatermarkStore;
};

export type BlockPollerOptions = {
  pollIntervalMs: number;
  maxBlockRange: number;
};

type InScopeEvent = {
  event: JobOpenedEvent;
  metadata: JobMetadata;
};

/** Splits an inclusive range into consecutive inclusive chunks of at most `maxBlockRange` blocks. */
export const splitBlockRange = (fromBlock: number, toBlock: number, maxBlockRange: number): BlockRange[] => {
  const ranges: BlockRange[] = [];
  for (let start = fromBlock; start <= toBlock; start += maxBlockRange) {
    ranges.push({ fromBlock: start, toBlock: Math.min(toBlock, start + maxBlockRange - 1) });
  }
  return ranges;
};

const log = (level: "log" | "warn" | "error", payload: Record<string, unknown>) => {
  // eslint-disable-next-line no-console
  console[level](JSON.stringify(payload));
};

/**
 * Advances a block watermark over new blocks and dispatches one verification task per
 * in-scope `JobOpened` event.
 *
 * The watermark moves to the observed head only after the whole range was queried and
 * every in-scope event from it was dispatched. Any RPC failure leaves it untouched, so the
 * next tick re-queries the same range.
 */
export class BlockWatermarkPoller {
  private watermark?: number;
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private running = false;

  constructor(
    private readonly deps: BlockPollerDeps,
    private readonly options: BlockPollerOptions
  ) {}

  getWatermark(): number | undefined {
    return this.watermark;
  }

  /** Starts from the persisted cursor when there is one, otherwise from the current head. */
  async initialize(): Promise<number> {
    const stored = await this.deps.watermarkStore?.load();
    const watermark = stored ?? (await this.deps.source.getHeadBlock());
    this.watermark = watermark;
    log("log", { event: "poller.initialized", watermark, origin: stored == null ? "chain_head" : "store" });
    return watermark;
  }

  async tick(): Promise<TickResult> {
    const watermark = this.watermark;
    if (watermark == null) {
      throw new Error("BlockWatermarkPoller.tick() called before initialize()");
    }

    let head: number;
    try {
      head = await this.deps.source.getHeadBlock();
    } catch (err) {
      return this.failed("head", err, watermark);
    }

    if (head <= watermark) {
      log("log", { event: "poller.idle", head, watermark });
      return { status: "idle", head, watermark };
    }

    const fromBlock = watermark + 1;
    const events: JobOpenedEvent[] = [];
    try {
      for (const range of splitBlockRange(fromBlock, head, this.options.maxBlockRange)) {
        events.push(...(await this.deps.source.getJobOpenedEvents(range)));
      }
    } catch (err) {
      return this.failed("events", err, watermark);
    }

    const inScope = this.filterEvents(events);

    let controlPlaneUrls: Map<string, string>;
    try {
      controlPlaneUrls = await this.lookupControlPlanes(inScope);
    } catch (err) {
      return this.failed("operators", err, watermark);
    }

    for (const { event, metadata } of inScope) {
      this.deps.dispatch({
        jobId: event.jobId,
        owner: event.owner,
        operator: event.operator,
        controlPlaneUrl: controlPlaneUrls.get(event.operator.toLowerCase()) ?? "",
        region: metadata.region ?? "",
        instanceLabel: metadata.instanceLabel
      });
    }

    this.watermark = head;
    await this.persistWatermark(head);

    const result: TickResult = {
      status: "advanced",
      fromBlock,
      toBlock: head,
      events: events.length,
      dispatched: inScope.length,
      skipped: events.length - inScope.length
    };
    log("log", { event: "poller.advanced", ...result });
    return result;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleNext();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  private scheduleNext(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.runGuardedTick().finally(() => {
        this.inFlight = undefined;
        if (this.running) this.scheduleNext();
      });
    }, this.options.pollIntervalMs);
  }

  private async runGuardedTick(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      log("error", { event: "poller.tick_crashed", reason: toErrorMessage(err), watermark: this.watermark ?? null });
    }
  }

  private filterEvents(events: JobOpenedEvent[]): InScopeEvent[] {
    const inScope: InScopeEvent[] = [];
    for (const event of events) {
      const decision = this.deps.filter.evaluate(event.declaredMetadata);
      if (decision.inScope) {
        inScope.push({ event, metadata: decision.metadata });
        continue;
      }
      log(decision.reason === "invalid_metadata" ? "warn" : "log", {
        event: "poller.job_skipped",
        jobId: event.jobId,
        blockNumber: event.blockNumber,
        reason: decision.reason,
        detail: decision.detail
      });
    }
    return inScope;
  }

  /** One lookup per distinct operator; all of them finish before anything is dispatched. */
  private async lookupControlPlanes(inScope: InScopeEvent[]): Promise<Map<string, string>> {
    const urls = new Map<string, string>();
    for (const { event } of inScope) {
      const key = event.operator.toLowerCase();
      if (urls.has(key)) continue;
      urls.set(key, await this.deps.source.getControlPlaneUrl(event.operator));
    }
    return urls;
  }

  private async persistWatermark(block: number): Promise<void> {
    if (!this.deps.watermarkStore) return;
    try {
      await this.deps.watermarkStore.save(block);
    } catch (err) {
      log("error", { event: "poller.watermark_save_failed", block, reason: toErrorMessage(err) });
    }
  }

  private failed(stage: TickFailureStage, err: unknown, watermark: number): TickResult {
    const reason = toErrorMessage(err);
    log("error", { event: "poller.tick_failed", stage, reason, watermark });
    return { status: "failed", stage, reason, watermark };
  }
}

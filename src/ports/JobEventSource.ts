import type { JobOpenedEvent } from "../core/jobs/job.types";

export type BlockRange = {
  fromBlock: number; // inclusive
  toBlock: number;   // inclusive
};

export interface JobEventSource {
  getHeadBlock(): Promise<number>;
  /** Events in source order: block number, then log index. */
  getJobOpenedEvents(range: BlockRange): Promise<JobOpenedEvent[]>;
  /** Base URL the operator registered for its control plane. */
  getControlPlaneUrl(operator: string): Promise<string>;
}

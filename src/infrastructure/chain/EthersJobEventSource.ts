import type { JobOpenedEvent } from "../../core/jobs/job.types";
import type { BlockRange, JobEventSource } from "../../ports/JobEventSource";
import { JOB_OPENED_TOPIC0, marketInterface } from "./market.abi";

export type RawLog = {
  blockNumber: number;
  index: number;
  topics: readonly string[];
  data: string;
};

/**
 * The slice of an ethers provider this source needs; a `JsonRpcProvider` satisfies it.
 */
export interface ChainRpc {
  getBlockNumber(): Promise<number>;
  getLogs(filter: { address: string; topics: string[]; fromBlock: number; toBlock: number }): Promise<readonly RawLog[]>;
  call(tx: { to: string; data: string }): Promise<string>;
}

const compareLogs = (a: RawLog, b: RawLog): number => a.blockNumber - b.blockNumber || a.index - b.index;

export const decodeJobOpenedLog = (log: RawLog): JobOpenedEvent | undefined => {
  let parsed: ReturnType<typeof marketInterface.parseLog>;
  try {
    parsed = marketInterface.parseLog(log);
  } catch {
    parsed = null;
  }
  if (!parsed || parsed.name !== "JobOpened") return undefined;

  const job: unknown = parsed.args[0];
  const metadata: unknown = parsed.args[1];
  const owner: unknown = parsed.args[2];
  const operator: unknown = parsed.args[3];
  if (typeof job !== "string" || typeof metadata !== "string" || typeof owner !== "string" || typeof operator !== "string") {
    return undefined;
  }

  return {
    jobId: job.toLowerCase(),
    owner,
    operator,
    declaredMetadata: metadata,
    blockNumber: log.blockNumber,
    logIndex: log.index
  };
};

export class EthersJobEventSource implements JobEventSource {
  constructor(
    private readonly rpc: ChainRpc,
    private readonly contractAddress: string
  ) {}

  getHeadBlock(): Promise<number> {
    return this.rpc.getBlockNumber();
  }

  async getJobOpenedEvents(range: BlockRange): Promise<JobOpenedEvent[]> {
    const logs = await this.rpc.getLogs({
      address: this.contractAddress,
      topics: [JOB_OPENED_TOPIC0],
      fromBlock: range.fromBlock,
      toBlock: range.toBlock
    });

    const events: JobOpenedEvent[] = [];
    for (const log of [...logs].sort(compareLogs)) {
      const event = decodeJobOpenedLog(log);
      if (!event) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "chain.log_undecodable",
          blockNumber: log.blockNumber,
          logIndex: log.index
        }));
        continue;
      }
      events.push(event);
    }
    return events;
  }

  async getControlPlaneUrl(operator: string): Promise<string> {
    const data = marketInterface.encodeFunctionData("providers", [operator]);
    const raw = await this.rpc.call({ to: this.contractAddress, data });
    const decoded = marketInterface.decodeFunctionResult("providers", raw);
    const url: unknown = decoded[0];
    if (typeof url !== "string") {
      throw new Error(`providers(${operator}) returned a non-string value`);
    }
    return url;
  }
}

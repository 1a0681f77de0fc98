import { EthersJobEventSource, type ChainRpc, type RawLog } from "../../src/infrastructure/chain/EthersJobEventSource";
import { JOB_OPENED_TOPIC0, marketInterface } from "../../src/infrastructure/chain/market.abi";

const CONTRACT = "0x1111111111111111111111111111111111111111";
const OWNER = "0x2222222222222222222222222222222222222222";
const OPERATOR = "0x3333333333333333333333333333333333333333";

const jobOpenedLog = (jobHex: string, metadata: string, blockNumber: number, index: number): RawLog => {
  const { topics, data } = marketInterface.encodeEventLog("JobOpened", [
    `0x${jobHex.repeat(32)}`,
    metadata,
    OWNER,
    OPERATOR,
    1n,
    2n,
    3n
  ]);
  return { blockNumber, index, topics, data };
};

const createFakeRpc = (logs: RawLog[]) => {
  const rpc = {
    getBlockNumber: jest.fn(async () => 1234),
    getLogs: jest.fn(async () => logs),
    call: jest.fn(async () => marketInterface.encodeFunctionResult("providers", ["https://cp.operator.example"]))
  } satisfies ChainRpc;
  return rpc;
};

describe("EthersJobEventSource", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("reads the head block from the provider", async () => {
    const source = new EthersJobEventSource(createFakeRpc([]), CONTRACT);
    await expect(source.getHeadBlock()).resolves.toBe(1234);
  });

  it("queries the inclusive range for JobOpened logs and decodes them in chain order", async () => {
    const rpc = createFakeRpc([
      jobOpenedLog("bb", '{"url":"b"}', 12, 0),
      jobOpenedLog("aa", '{"url":"a"}', 10, 3),
      jobOpenedLog("cc", '{"url":"c"}', 12, 1)
    ]);
    const source = new EthersJobEventSource(rpc, CONTRACT);

    const events = await source.getJobOpenedEvents({ fromBlock: 10, toBlock: 20 });

    expect(rpc.getLogs).toHaveBeenCalledWith({
      address: CONTRACT,
      topics: [JOB_OPENED_TOPIC0],
      fromBlock: 10,
      toBlock: 20
    });
    expect(events.map((e) => [e.blockNumber, e.logIndex, e.declaredMetadata])).toEqual([
      [10, 3, '{"url":"a"}'],
      [12, 0, '{"url":"b"}'],
      [12, 1, '{"url":"c"}']
    ]);
    expect(events[0]).toEqual({
      jobId: `0x${"aa".repeat(32)}`,
      owner: OWNER,
      operator: OPERATOR,
      declaredMetadata: '{"url":"a"}',
      blockNumber: 10,
      logIndex: 3
    });
  });

  it("skips logs that do not decode as JobOpened", async () => {
    const rpc = createFakeRpc([
      { blockNumber: 11, index: 0, topics: [`0x${"ee".repeat(32)}`], data: "0x" },
      jobOpenedLog("aa", "{}", 12, 0)
    ]);
    const source = new EthersJobEventSource(rpc, CONTRACT);

    const events = await source.getJobOpenedEvents({ fromBlock: 11, toBlock: 12 });

    expect(events).toHaveLength(1);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toEqual({
      event: "chain.log_undecodable",
      blockNumber: 11,
      logIndex: 0
    });
  });

  it("propagates provider failures", async () => {
    const rpc = createFakeRpc([]);
    rpc.getLogs.mockRejectedValueOnce(new Error("query returned more than 10000 results"));
    const source = new EthersJobEventSource(rpc, CONTRACT);

    await expect(source.getJobOpenedEvents({ fromBlock: 1, toBlock: 2 })).rejects.toThrow(
      "query returned more than 10000 results"
    );
  });

  it("reads the operator's control plane URL from the providers mapping", async () => {
    const rpc = createFakeRpc([]);
    const source = new EthersJobEventSource(rpc, CONTRACT);

    await expect(source.getControlPlaneUrl(OPERATOR)).resolves.toBe("https://cp.operator.example");
    expect(rpc.call).toHaveBeenCalledWith({
      to: CONTRACT,
      data: marketInterface.encodeFunctionData("providers", [OPERATOR])
    });
  });
});

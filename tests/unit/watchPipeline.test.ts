import http from "http";
import type { AddressInfo } from "net";
import { PollingAddressResolver } from "../../src/application/verify-job/addressResolver";
import { FailureRecorder } from "../../src/application/verify-job/failureRecorder";
import { JobVerificationWorker } from "../../src/application/verify-job/jobVerificationWorker";
import { createVerificationPool } from "../../src/application/verify-job/verificationPool";
import { BlockWatermarkPoller } from "../../src/application/watch-jobs/blockPoller";
import type { FailureRecord } from "../../src/core/failures/failureRecord";
import type { JobOpenedEvent, JobVerificationTask } from "../../src/core/jobs/job.types";
import { createMetadataFilter, defaultAllowedImageUrls } from "../../src/core/jobs/metadataFilter";
import { ControlPlaneHttpClient } from "../../src/infrastructure/controlplane/ControlPlaneHttpClient";
import { CrossCheckHttpClient } from "../../src/infrastructure/controlplane/CrossCheckHttpClient";
import type { JobEventSource } from "../../src/ports/JobEventSource";
import type { ReachabilityProbe } from "../../src/ports/ReachabilityProbe";
import { createLimiter } from "../../src/shared/concurrency/limiter";

type TestServer = {
  baseUrl: string;
  requests: string[];
  close: () => Promise<void>;
};

const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const requests: string[] = [];
  const server = http.createServer((req, res) => {
    requests.push(req.url ?? "");
    handler(req, res);
  });
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const json = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const NOW_MS = 1_700_000_500_000;
const OPERATOR = "0xAbCdEf0000000000000000000000000000000001";

const openedAt = (blockNumber: number, metadata: Record<string, unknown>): JobOpenedEvent => ({
  jobId: "0xabc123",
  owner: "0x2222222222222222222222222222222222222222",
  operator: OPERATOR,
  declaredMetadata: JSON.stringify(metadata),
  blockNumber,
  logIndex: 0
});

const runPipeline = async (args: {
  controlPlaneUrl: string;
  crossCheckTemplate: string;
  events: JobOpenedEvent[];
  resolveTimeoutMs?: number;
}) => {
  let head = 100;
  const records: FailureRecord[] = [];
  const probed: string[] = [];
  const started: JobVerificationTask[] = [];

  const source: JobEventSource = {
    getHeadBlock: async () => head,
    getJobOpenedEvents: async (range) =>
      args.events.filter((e) => e.blockNumber >= range.fromBlock && e.blockNumber <= range.toBlock),
    getControlPlaneUrl: async () => args.controlPlaneUrl
  };
  const probe: ReachabilityProbe = {
    probe: async (address) => {
      probed.push(address);
      return { reachable: true };
    }
  };
  const recorder = new FailureRecorder({
    insert: async (record) => {
      records.push(record);
      return { ...record, id: records.length };
    }
  }, () => NOW_MS);
  const resolver = new PollingAddressResolver(new ControlPlaneHttpClient(1000), {
    timeoutMs: args.resolveTimeoutMs ?? 2000,
    minDelayMs: 5,
    maxDelayMs: 10
  });
  const crossChecker = new CrossCheckHttpClient(args.crossCheckTemplate, 1000);

  const pool = createVerificationPool({
    limiter: createLimiter(4),
    createRunner: (task) => {
      started.push(task);
      return new JobVerificationWorker(task, { resolver, probe, crossChecker, recorder }, { startupDelayMs: 0 });
    }
  });
  const poller = new BlockWatermarkPoller(
    { source, filter: createMetadataFilter(), dispatch: (task) => pool.dispatch(task) },
    { pollIntervalMs: 1000, maxBlockRange: 5000 }
  );

  await poller.initialize();
  head = 101;
  await poller.tick();
  await pool.drain();

  return { records, probed, started };
};

describe("watch pipeline", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("records nothing for a healthy job whose address shows up after a delay", async () => {
    let lookups = 0;
    const controlPlane = await startServer((_req, res) => {
      lookups += 1;
      if (lookups < 3) {
        json(res, 404, { error: "pending" });
        return;
      }
      json(res, 200, { ip: "3.4.5.6" });
    });
    const refresh = await startServer((_req, res) => json(res, 200, { ip: "3.4.5.6" }));

    const { records, probed } = await runPipeline({
      controlPlaneUrl: controlPlane.baseUrl,
      crossCheckTemplate: `${refresh.baseUrl}/refresh/{jobId}`,
      events: [openedAt(101, { url: defaultAllowedImageUrls[0], region: "us-east" })]
    });

    expect(controlPlane.requests).toEqual([
      "/ip?id=0xabc123&region=us-east",
      "/ip?id=0xabc123&region=us-east",
      "/ip?id=0xabc123&region=us-east"
    ]);
    expect(probed).toEqual(["3.4.5.6"]);
    expect(refresh.requests).toEqual(["/refresh/0xabc123"]);
    expect(records).toEqual([]);

    await controlPlane.close();
    await refresh.close();
  });

  it("records one endpoint failure when the refresh endpoint has no ip", async () => {
    const controlPlane = await startServer((_req, res) => json(res, 200, { ip: "3.4.5.6" }));
    const refresh = await startServer((_req, res) => json(res, 200, {}));

    const { records } = await runPipeline({
      controlPlaneUrl: controlPlane.baseUrl,
      crossCheckTemplate: `${refresh.baseUrl}/refresh/{jobId}`,
      events: [openedAt(101, { url: defaultAllowedImageUrls[1], region: "us-east" })]
    });

    expect(records).toEqual([{
      kind: "endpoint",
      jobId: "0xabc123",
      operator: "0xabcdef0000000000000000000000000000000001",
      networkAddress: "3.4.5.6",
      message: "ip field not found in refresh API response",
      timestampSeconds: 1_700_000_500
    }]);

    await controlPlane.close();
    await refresh.close();
  });

  it("never starts a verification for an out-of-scope job", async () => {
    const controlPlane = await startServer((_req, res) => json(res, 200, { ip: "3.4.5.6" }));
    const refresh = await startServer((_req, res) => json(res, 200, { ip: "3.4.5.6" }));

    const { records, started } = await runPipeline({
      controlPlaneUrl: controlPlane.baseUrl,
      crossCheckTemplate: `${refresh.baseUrl}/refresh/{jobId}`,
      events: [openedAt(101, { url: "https://images.example/custom.eif", region: "us-east" })]
    });

    expect(started).toEqual([]);
    expect(records).toEqual([]);
    expect(controlPlane.requests).toEqual([]);
    expect(refresh.requests).toEqual([]);

    await controlPlane.close();
    await refresh.close();
  });

  it("records a reachability failure with the unknown address when no address ever shows up", async () => {
    const controlPlane = await startServer((_req, res) => json(res, 404, { error: "pending" }));
    const refresh = await startServer((_req, res) => json(res, 200, { ip: "3.4.5.6" }));

    const { records, probed } = await runPipeline({
      controlPlaneUrl: controlPlane.baseUrl,
      crossCheckTemplate: `${refresh.baseUrl}/refresh/{jobId}`,
      events: [openedAt(101, { url: defaultAllowedImageUrls[0], region: "us-east" })],
      resolveTimeoutMs: 40
    });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      kind: "reachability",
      jobId: "0xabc123",
      networkAddress: "unknown"
    });
    expect(records[0]?.message.startsWith("Failed to get IP address: no address after ")).toBe(true);
    expect(probed).toEqual([]);
    expect(refresh.requests).toEqual([]);

    await controlPlane.close();
    await refresh.close();
  });
});

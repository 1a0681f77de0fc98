import type { Server } from "http";
import { JsonRpcProvider } from "ethers";
import { createVerificationPool } from "../application/verify-job/verificationPool";
import { FailureRecorder } from "../application/verify-job/failureRecorder";
import { JobVerificationWorker } from "../application/verify-job/jobVerificationWorker";
import { PollingAddressResolver } from "../application/verify-job/addressResolver";
import { BlockWatermarkPoller } from "../application/watch-jobs/blockPoller";
import { createMetadataFilter } from "../core/jobs/metadataFilter";
import { EthersJobEventSource } from "../infrastructure/chain/EthersJobEventSource";
import { ControlPlaneHttpClient } from "../infrastructure/controlplane/ControlPlaneHttpClient";
import { CrossCheckHttpClient } from "../infrastructure/controlplane/CrossCheckHttpClient";
import { createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { MongoFailureRepository } from "../infrastructure/mongo/MongoFailureRepository";
import { MongoWatermarkStore } from "../infrastructure/mongo/MongoWatermarkStore";
import { TcpReachabilityProbe } from "../infrastructure/network/TcpReachabilityProbe";
import { createServer, type WatcherStatus } from "../server";
import { createLimiter } from "../shared/concurrency/limiter";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type WatcherHandle = {
  status(): WatcherStatus;
  /** Stops polling and releases connections. In-flight verifications are not awaited. */
  stop(): Promise<void>;
};

const listenServer = (server: Server, port: number): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port);
  });

const closeServer = (server: Server): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
  });

export const startWatcher = async (env: NodeJS.ProcessEnv = process.env): Promise<WatcherHandle> => {
  const settings = loadEnv(env);
  const { watcherConfig: config, healthPort, persistWatermark } = loadRuntimeConfigFromEnv(env);

  const mongo = await createMongoClient(settings.MONGO_URI);
  const provider = new JsonRpcProvider(settings.RPC_URL);

  try {
    const recorder = new FailureRecorder(new MongoFailureRepository(mongo, settings.MONGO_DB, settings.CHAIN_LABEL));
    const resolver = new PollingAddressResolver(new ControlPlaneHttpClient(config.httpTimeoutMs), {
      timeoutMs: config.resolveTimeoutMs,
      minDelayMs: config.resolveMinDelayMs,
      maxDelayMs: config.resolveMaxDelayMs
    });
    const probe = new TcpReachabilityProbe(config.probePort, config.probeTimeoutMs);
    const crossChecker = new CrossCheckHttpClient(settings.CROSS_CHECK_URL_TEMPLATE, config.httpTimeoutMs);

    const pool = createVerificationPool({
      limiter: createLimiter(config.verifyConcurrency),
      createRunner: (task) =>
        new JobVerificationWorker(task, { resolver, probe, crossChecker, recorder }, { startupDelayMs: config.startupDelayMs })
    });

    const poller = new BlockWatermarkPoller(
      {
        source: new EthersJobEventSource(provider, settings.CONTRACT_ADDRESS),
        filter: createMetadataFilter(settings.ALLOWED_IMAGE_URLS),
        dispatch: (task) => pool.dispatch(task),
        watermarkStore: persistWatermark
          ? new MongoWatermarkStore(mongo, settings.MONGO_DB, settings.CHAIN_LABEL)
          : undefined
      },
      { pollIntervalMs: config.pollIntervalMs, maxBlockRange: config.maxBlockRange }
    );

    await poller.initialize();

    const status = (): WatcherStatus => {
      const { active, queued } = pool.stats();
      return { watermark: poller.getWatermark() ?? null, inFlight: active, queued };
    };

    let server: Server | undefined;
    if (healthPort != null) {
      server = createServer(status);
      await listenServer(server, healthPort);
      server.on("error", (err) => {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "health.error", message: err.message }));
      });
    }

    poller.start();

    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "watch.started",
      chain: settings.CHAIN_LABEL,
      contract: settings.CONTRACT_ADDRESS,
      watermark: poller.getWatermark() ?? null,
      healthPort: healthPort ?? null
    }));

    return {
      status,
      stop: async () => {
        await poller.stop();
        try {
          if (server) await closeServer(server);
        } finally {
          provider.destroy();
          await mongo.close();
        }
      }
    };
  } catch (err) {
    provider.destroy();
    await mongo.close();
    throw err;
  }
};

import { startWatcher, type WatcherHandle } from "../composition/root";

type ErrorContext = Partial<{
  jobId: string;
  attempts: number;
  elapsedMs: number;
}>;

type CliErrorEnvelope = {
  event: "watch.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const SHUTDOWN_GRACE_MS = 10_000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.jobId === "string") sanitizedContext.jobId = value.jobId;
  if (typeof value.attempts === "number" && Number.isFinite(value.attempts)) sanitizedContext.attempts = value.attempts;
  if (typeof value.elapsedMs === "number" && Number.isFinite(value.elapsedMs)) sanitizedContext.elapsedMs = value.elapsedMs;

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord: Record<string, unknown> = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "watch.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const installShutdownHandlers = (handle: WatcherHandle): void => {
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "watch.stopping", signal }));

    setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS).unref();
    void handle.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode())));
        process.exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

export const executeWatchCli = async (): Promise<void> => {
  try {
    const handle = await startWatcher();
    installShutdownHandlers(handle);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeWatchCli();
}

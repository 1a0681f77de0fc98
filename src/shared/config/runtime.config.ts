import {
  defaultWatcherConfig,
  type WatcherConfig,
  validateWatcherConfig,
  watcherCaps
} from "../../application/watch-jobs/watcher.config";

export const runtimeCaps = {
  healthPort: { min: 1, max: 65_535 }
} as const;

export type RuntimeConfig = {
  watcherConfig: WatcherConfig;
  healthPort?: number;
  persistWatermark: boolean;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseFlag = (env: NodeJS.ProcessEnv, name: string): boolean => {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true";
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const d = defaultWatcherConfig;
  const watcherConfig = validateWatcherConfig({
    pollIntervalMs: parseOptionalIntInRange(env, "POLL_INTERVAL_MS", watcherCaps.pollIntervalMs) ?? d.pollIntervalMs,
    maxBlockRange: parseOptionalIntInRange(env, "MAX_BLOCK_RANGE", watcherCaps.maxBlockRange) ?? d.maxBlockRange,
    verifyConcurrency: parseOptionalIntInRange(env, "VERIFY_CONCURRENCY", watcherCaps.verifyConcurrency) ?? d.verifyConcurrency,
    startupDelayMs: parseOptionalIntInRange(env, "STARTUP_DELAY_MS", watcherCaps.startupDelayMs) ?? d.startupDelayMs,
    resolveTimeoutMs: parseOptionalIntInRange(env, "RESOLVE_TIMEOUT_MS", watcherCaps.resolveTimeoutMs) ?? d.resolveTimeoutMs,
    resolveMinDelayMs: parseOptionalIntInRange(env, "RESOLVE_MIN_DELAY_MS", watcherCaps.resolveMinDelayMs) ?? d.resolveMinDelayMs,
    resolveMaxDelayMs: parseOptionalIntInRange(env, "RESOLVE_MAX_DELAY_MS", watcherCaps.resolveMaxDelayMs) ?? d.resolveMaxDelayMs,
    httpTimeoutMs: parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", watcherCaps.httpTimeoutMs) ?? d.httpTimeoutMs,
    probePort: parseOptionalIntInRange(env, "PROBE_PORT", watcherCaps.probePort) ?? d.probePort,
    probeTimeoutMs: parseOptionalIntInRange(env, "PROBE_TIMEOUT_MS", watcherCaps.probeTimeoutMs) ?? d.probeTimeoutMs
  });

  return {
    watcherConfig,
    healthPort: parseOptionalIntInRange(env, "HEALTH_PORT", runtimeCaps.healthPort),
    persistWatermark: parseFlag(env, "PERSIST_WATERMARK")
  };
};

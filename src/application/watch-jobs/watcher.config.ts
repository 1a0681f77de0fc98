export type WatcherConfig = {
  pollIntervalMs: number;
  maxBlockRange: number;
  verifyConcurrency: number;
  startupDelayMs: number;
  resolveTimeoutMs: number;
  resolveMinDelayMs: number;
  resolveMaxDelayMs: number;
  httpTimeoutMs: number;
  probePort: number;
  probeTimeoutMs: number;
};

export type WatcherConfigInput = Partial<WatcherConfig>;

export const defaultWatcherConfig: WatcherConfig = {
  pollIntervalMs: 10_000,
  maxBlockRange: 5_000,
  verifyConcurrency: 50,
  startupDelayMs: 180_000,
  resolveTimeoutMs: 300_000,
  resolveMinDelayMs: 5_000,
  resolveMaxDelayMs: 30_000,
  httpTimeoutMs: 8_000,
  probePort: 1300,
  probeTimeoutMs: 5_000
};

export const watcherCaps = {
  pollIntervalMs: { min: 1000, max: 600_000 },
  maxBlockRange: { min: 1, max: 100_000 },
  verifyConcurrency: { min: 1, max: 500 },
  startupDelayMs: { min: 0, max: 3_600_000 },
  resolveTimeoutMs: { min: 1000, max: 1_800_000 },
  resolveMinDelayMs: { min: 100, max: 60_000 },
  resolveMaxDelayMs: { min: 100, max: 300_000 },
  httpTimeoutMs: { min: 1000, max: 30_000 },
  probePort: { min: 1, max: 65_535 },
  probeTimeoutMs: { min: 100, max: 60_000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateWatcherConfig = (config: WatcherConfig): WatcherConfig => {
  assertIntegerInRange("pollIntervalMs", config.pollIntervalMs, watcherCaps.pollIntervalMs.min, watcherCaps.pollIntervalMs.max);
  assertIntegerInRange("maxBlockRange", config.maxBlockRange, watcherCaps.maxBlockRange.min, watcherCaps.maxBlockRange.max);
  assertIntegerInRange("verifyConcurrency", config.verifyConcurrency, watcherCaps.verifyConcurrency.min, watcherCaps.verifyConcurrency.max);
  assertIntegerInRange("startupDelayMs", config.startupDelayMs, watcherCaps.startupDelayMs.min, watcherCaps.startupDelayMs.max);
  assertIntegerInRange("resolveTimeoutMs", config.resolveTimeoutMs, watcherCaps.resolveTimeoutMs.min, watcherCaps.resolveTimeoutMs.max);
  assertIntegerInRange("resolveMinDelayMs", config.resolveMinDelayMs, watcherCaps.resolveMinDelayMs.min, watcherCaps.resolveMinDelayMs.max);
  assertIntegerInRange("resolveMaxDelayMs", config.resolveMaxDelayMs, watcherCaps.resolveMaxDelayMs.min, watcherCaps.resolveMaxDelayMs.max);
  assertIntegerInRange("httpTimeoutMs", config.httpTimeoutMs, watcherCaps.httpTimeoutMs.min, watcherCaps.httpTimeoutMs.max);
  assertIntegerInRange("probePort", config.probePort, watcherCaps.probePort.min, watcherCaps.probePort.max);
  assertIntegerInRange("probeTimeoutMs", config.probeTimeoutMs, watcherCaps.probeTimeoutMs.min, watcherCaps.probeTimeoutMs.max);
  if (config.resolveMinDelayMs > config.resolveMaxDelayMs) {
    throw new Error(
      `resolveMinDelayMs=${config.resolveMinDelayMs} must not exceed resolveMaxDelayMs=${config.resolveMaxDelayMs}`
    );
  }
  return config;
};

export const resolveWatcherConfig = (input: WatcherConfigInput = {}): WatcherConfig =>
  validateWatcherConfig({ ...defaultWatcherConfig, ...input });

export type FailureKind = "reachability" | "endpoint";

/** Written in place of an address when resolution never produced one. */
export const UNKNOWN_ADDRESS = "unknown";

export type FailureRecord = {
  kind: FailureKind;
  jobId: string;
  operator: string;
  networkAddress: string;
  message: string;
  timestampSeconds: number;
};

export type StoredFailureRecord = FailureRecord & { id: number };

export const formatOperatorIdentity = (operator: string): string => operator.trim().toLowerCase();

export const toEpochSeconds = (ms: number): number => Math.floor(ms / 1000);

export const buildFailureRecord = (
  args: Omit<FailureRecord, "timestampSeconds" | "operator"> & { operator: string; nowMs: number }
): FailureRecord => ({
  kind: args.kind,
  jobId: args.jobId,
  operator: formatOperatorIdentity(args.operator),
  networkAddress: args.networkAddress.trim() === "" ? UNKNOWN_ADDRESS : args.networkAddress,
  message: args.message,
  timestampSeconds: toEpochSeconds(args.nowMs)
});

export type CrossCheckFailureReason = "transport" | "decode" | "missing_field";

export type CrossCheckResult =
  | { ok: true; address: string }
  | { ok: false; reason: CrossCheckFailureReason; message: string };

export interface EndpointCrossChecker {
  check(jobId: string): Promise<CrossCheckResult>;
}

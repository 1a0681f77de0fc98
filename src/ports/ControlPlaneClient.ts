export type AddressLookupParams = {
  controlPlaneUrl: string;
  jobId: string;
  region: string;
};

/**
 * Errors thrown by a client may carry `status`, `isTimeout`, `retryDelayMs`, and
 * `terminal` (set when waiting longer cannot help, e.g. a malformed operator URL).
 */
export interface ControlPlaneClient {
  /** Resolves `null` while the control plane has no address for the job yet. */
  fetchAddress(params: AddressLookupParams): Promise<string | null>;
}

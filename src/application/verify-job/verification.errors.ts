export type AddressResolutionFailureCode = "resolution_timeout" | "resolution_rejected";

export type AddressResolutionContext = {
  jobId: string;
  attempts: number;
  elapsedMs: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class AddressResolutionError extends Error {
  readonly code: AddressResolutionFailureCode;
  readonly context: AddressResolutionContext;
  readonly cause?: unknown;

  constructor(args: {
    code: AddressResolutionFailureCode;
    message: string;
    context: AddressResolutionContext;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "AddressResolutionError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised internally while the control plane has no address for the job yet. */
export class AddressPendingError extends Error {
  constructor(jobId: string) {
    super(`control plane has no address for job ${jobId} yet`);
    this.name = "AddressPendingError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type JobOpenedEvent = {
  jobId: string;            // 0x-prefixed lowercase hex of the bytes32 job id
  owner: string;
  operator: string;
  declaredMetadata: string; // raw metadata string as emitted on-chain
  blockNumber: number;
  logIndex: number;
};

export type JobMetadata = {
  imageUrl?: string;
  instanceLabel?: string;
  region?: string;
};

export type JobVerificationTask = {
  jobId: string;
  owner: string;
  operator: string;
  controlPlaneUrl: string;
  region: string;
  instanceLabel?: string;
};

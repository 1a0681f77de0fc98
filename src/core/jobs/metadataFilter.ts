import type { JobMetadata } from "./job.types";

export class InvalidMetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidMetadataError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const defaultAllowedImageUrls: readonly string[] = [
  "https://artifacts.marlin.org/oyster/eifs/base-blue_v3.0.0_linux_amd64.eif",
  "https://artifacts.marlin.org/oyster/eifs/base-blue_v3.0.0_linux_arm64.eif"
];

export type ScopeExclusionReason = "invalid_metadata" | "missing_image_url" | "image_not_allowed";

export type ScopeDecision =
  | {
      inScope: true;
      imageUrl: string;
      metadata: JobMetadata;
    }
  | {
      inScope: false;
      reason: ScopeExclusionReason;
      detail: string;
    };

export type MetadataFilter = {
  evaluate(declaredMetadata: string): ScopeDecision;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readOptionalString = (doc: Record<string, unknown>, key: string): string | undefined => {
  const value = doc[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidMetadataError(`Invalid metadata: "${key}" must be a string`);
  }
  return value;
};

/**
 * Parses the metadata string a job declares on-chain.
 * Only `url`, `instance` and `region` are read; other keys are ignored.
 */
export const parseJobMetadata = (raw: string): JobMetadata => {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new InvalidMetadataError(`Invalid metadata: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(doc)) {
    throw new InvalidMetadataError("Invalid metadata: expected a JSON object");
  }

  return {
    imageUrl: readOptionalString(doc, "url"),
    instanceLabel: readOptionalString(doc, "instance"),
    region: readOptionalString(doc, "region")
  };
};

export const createMetadataFilter = (allowedImageUrls: readonly string[] = defaultAllowedImageUrls): MetadataFilter => {
  const allowed = new Set(allowedImageUrls);

  return {
    evaluate(declaredMetadata) {
      let metadata: JobMetadata;
      try {
        metadata = parseJobMetadata(declaredMetadata);
      } catch (err) {
        if (err instanceof InvalidMetadataError) {
          return { inScope: false, reason: "invalid_metadata", detail: err.message };
        }
        throw err;
      }

      const { imageUrl } = metadata;
      if (imageUrl == null) {
        return { inScope: false, reason: "missing_image_url", detail: "no url in metadata" };
      }
      if (!allowed.has(imageUrl)) {
        return { inScope: false, reason: "image_not_allowed", detail: imageUrl };
      }

      return { inScope: true, imageUrl, metadata };
    }
  };
};

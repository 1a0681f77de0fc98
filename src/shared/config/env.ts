import { isAddress } from "ethers";
import { defaultAllowedImageUrls } from "../../core/jobs/metadataFilter";
import { defaultCrossCheckUrlTemplate, JOB_ID_PLACEHOLDER } from "../../infrastructure/controlplane/CrossCheckHttpClient";

export type Env = {
  RPC_URL: string;
  CONTRACT_ADDRESS: string;
  MONGO_URI: string;
  MONGO_DB: string;
  CHAIN_LABEL: string;
  CROSS_CHECK_URL_TEMPLATE: string;
  ALLOWED_IMAGE_URLS: string[];
};

const required = (env: NodeJS.ProcessEnv, name: string): string => {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validateCrossCheckTemplate = (value: string): string => {
  if (!value.includes(JOB_ID_PLACEHOLDER)) {
    throw new Error(`CROSS_CHECK_URL_TEMPLATE must contain ${JOB_ID_PLACEHOLDER}. Received: ${value}`);
  }
  // validate with a sample id substituted so the placeholder itself is not parsed as a host
  validateHttpUrl("CROSS_CHECK_URL_TEMPLATE", value.split(JOB_ID_PLACEHOLDER).join("0x00"));
  return value;
};

const parseUrlList = (name: string, raw: string | undefined, fallback: readonly string[]): string[] => {
  if (raw == null || raw.trim() === "") return [...fallback];
  const entries = raw.split(",").map((entry) => entry.trim()).filter((entry) => entry !== "");
  if (entries.length === 0) {
    throw new Error(`${name} must list at least one URL`);
  }
  return entries;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const RPC_URL = validateHttpUrl("RPC_URL", required(env, "RPC_URL"));

  const CONTRACT_ADDRESS = required(env, "CONTRACT_ADDRESS");
  if (!isAddress(CONTRACT_ADDRESS)) {
    throw new Error(`CONTRACT_ADDRESS must be a valid address. Received: ${CONTRACT_ADDRESS}`);
  }

  const MONGO_URI = env.MONGO_URI?.trim() || "mongodb://localhost:27017/reachability";
  const MONGO_DB = env.MONGO_DB?.trim() || "reachability";

  const CHAIN_LABEL = env.CHAIN_LABEL?.trim() || "arbone";
  if (!/^[a-z0-9_]+$/.test(CHAIN_LABEL)) {
    throw new Error(`CHAIN_LABEL must match [a-z0-9_]+. Received: ${CHAIN_LABEL}`);
  }

  const CROSS_CHECK_URL_TEMPLATE = validateCrossCheckTemplate(
    env.CROSS_CHECK_URL_TEMPLATE?.trim() || defaultCrossCheckUrlTemplate
  );
  const ALLOWED_IMAGE_URLS = parseUrlList("ALLOWED_IMAGE_URLS", env.ALLOWED_IMAGE_URLS, defaultAllowedImageUrls);

  return { RPC_URL, CONTRACT_ADDRESS, MONGO_URI, MONGO_DB, CHAIN_LABEL, CROSS_CHECK_URL_TEMPLATE, ALLOWED_IMAGE_URLS };
};

import { isIP } from "net";
import type { AddressLookupParams, ControlPlaneClient } from "../../ports/ControlPlaneClient";
import { createHttpRequestError, failedStatusError, fetchWithTimeout, toSafeRequestUrl } from "../http/fetchWithTimeout";

export class InvalidControlPlaneUrlError extends Error {
  readonly terminal = true;

  constructor(readonly controlPlaneUrl: string) {
    super(`Operator control plane URL is not a valid http/https URL: "${controlPlaneUrl}"`);
    this.name = "InvalidControlPlaneUrlError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const buildAddressLookupUrl = (params: AddressLookupParams): URL => {
  let url: URL;
  try {
    url = new URL(params.controlPlaneUrl);
  } catch {
    throw new InvalidControlPlaneUrlError(params.controlPlaneUrl);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidControlPlaneUrlError(params.controlPlaneUrl);
  }

  url.pathname = url.pathname.endsWith("/") ? `${url.pathname}ip` : `${url.pathname}/ip`;
  url.searchParams.set("id", params.jobId);
  url.searchParams.set("region", params.region);
  return url;
};

/**
 * Single lookup against an operator's control plane: `GET {cp}/ip?id=&region=`.
 * Polling until an address shows up is the resolver's job, not this client's.
 */
export class ControlPlaneHttpClient implements ControlPlaneClient {
  constructor(private readonly timeoutMs = 8000) {}

  async fetchAddress(params: AddressLookupParams): Promise<string | null> {
    const url = buildAddressLookupUrl(params);
    const res = await fetchWithTimeout(url, this.timeoutMs);

    // the control plane answers 404 until the instance has an address
    if (res.status === 404) {
      return null;
    }
    if (!res.ok) {
      throw failedStatusError(res, url, "Control plane");
    }

    let json: unknown;
    try {
      json = JSON.parse(res.body);
    } catch {
      throw createHttpRequestError("Control plane response is not valid JSON", {
        status: res.status,
        requestUrl: toSafeRequestUrl(url)
      });
    }

    const ip = typeof json === "object" && json !== null && "ip" in json ? json.ip : undefined;
    if (typeof ip !== "string" || ip.trim() === "") {
      return null;
    }

    const address = ip.trim();
    if (isIP(address) === 0) {
      throw createHttpRequestError(`Control plane returned a malformed address: "${address}"`, {
        status: res.status,
        terminal: true,
        requestUrl: toSafeRequestUrl(url)
      });
    }
    return address;
  }
}

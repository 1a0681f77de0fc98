import type { CrossCheckResult, EndpointCrossChecker } from "../../ports/EndpointCrossChecker";
import { fetchWithTimeout, type HttpTextResponse } from "../http/fetchWithTimeout";

export const JOB_ID_PLACEHOLDER = "{jobId}";

export const defaultCrossCheckUrlTemplate = `https://sk.arb1.marlin.org/operators/jobs/refresh/ArbOne/${JOB_ID_PLACEHOLDER}`;

export const buildCrossCheckUrl = (template: string, jobId: string): URL =>
  new URL(template.split(JOB_ID_PLACEHOLDER).join(encodeURIComponent(jobId)));

const statusSuffix = (res: HttpTextResponse): string => (res.ok ? "" : ` (HTTP ${res.status})`);

/**
 * Second-source check against the externally owned refresh endpoint.
 * The response body decides the outcome; the HTTP status only annotates the message.
 */
export class CrossCheckHttpClient implements EndpointCrossChecker {
  constructor(
    private readonly urlTemplate: string = defaultCrossCheckUrlTemplate,
    private readonly timeoutMs = 8000
  ) {}

  async check(jobId: string): Promise<CrossCheckResult> {
    let res: HttpTextResponse;
    try {
      const url = buildCrossCheckUrl(this.urlTemplate, jobId);
      res = await fetchWithTimeout(url, this.timeoutMs);
    } catch (err) {
      return {
        ok: false,
        reason: "transport",
        message: `Failed to call refresh API: ${err instanceof Error ? err.message : String(err)}`
      };
    }

    let body: unknown;
    try {
      body = JSON.parse(res.body);
    } catch (err) {
      return {
        ok: false,
        reason: "decode",
        message: `Failed to parse refresh API response${statusSuffix(res)}: ${err instanceof Error ? err.message : String(err)}`
      };
    }

    const ip = typeof body === "object" && body !== null && "ip" in body ? body.ip : undefined;
    if (typeof ip !== "string" || ip.trim() === "") {
      return {
        ok: false,
        reason: "missing_field",
        message: `ip field not found in refresh API response${statusSuffix(res)}`
      };
    }

    return { ok: true, address: ip.trim() };
  }
}

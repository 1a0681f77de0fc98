export type HttpRequestError = Error & {
  status?: number;
  isTimeout?: boolean;
  terminal?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;
};

/** Origin + path + query, never userinfo or fragment. */
export const toSafeRequestUrl = (url: URL): string => `${url.origin}${url.pathname}${url.search}`;

export const createHttpRequestError = (
  message: string,
  fields: Omit<HttpRequestError, "name" | "message">
): HttpRequestError => Object.assign(new Error(message), fields);

export const describeTransportError = (err: unknown): string => {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  return cause instanceof Error ? `${err.message} (${cause.message})` : err.message;
};

/**
 * Status, body text and Retry-After of a completed GET. The body is read inside the
 * timeout window, so a stalled body fails the same way a stalled connect does.
 */
export type HttpTextResponse = {
  status: number;
  ok: boolean;
  body: string;
  retryAfterMs?: number;
};

const parseRetryAfterMs = (res: Response): number | undefined => {
  const retryAfter = res.headers.get("retry-after");
  if (retryAfter && /^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }
  return undefined;
};

/**
 * GET with an abort-based timeout covering headers and body. Transport failures and
 * timeouts reject with an HttpRequestError; any HTTP response, whatever its status, resolves.
 */
export const fetchWithTimeout = async (url: URL, timeoutMs: number): Promise<HttpTextResponse> => {
  const requestUrl = toSafeRequestUrl(url);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url.toString(), {
      headers: { accept: "application/json" },
      signal: controller.signal
    });
    const body = await res.text();
    return { status: res.status, ok: res.ok, body, retryAfterMs: parseRetryAfterMs(res) };
  } catch (err) {
    if (controller.signal.aborted) {
      throw createHttpRequestError(`request timeout after ${timeoutMs}ms`, { isTimeout: true, requestUrl });
    }
    throw createHttpRequestError(describeTransportError(err), { requestUrl, cause: err });
  } finally {
    clearTimeout(timeout);
  }
};

export const failedStatusError = (res: HttpTextResponse, url: URL, label: string): HttpRequestError =>
  createHttpRequestError(`${label} request failed: ${res.status}`, {
    status: res.status,
    requestUrl: toSafeRequestUrl(url),
    retryDelayMs: res.status === 429 ? res.retryAfterMs : undefined
  });

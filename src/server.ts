import http from "http";

export type WatcherStatus = {
  watermark: number | null;
  inFlight: number;
  queued: number;
};

/** Liveness endpoint: every request gets the watcher's current status. */
export const createServer = (getStatus: () => WatcherStatus) => {
  return http.createServer((_req, res) => {
    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ ok: true, ...getStatus() }));
  });
};

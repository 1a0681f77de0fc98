import { createServer } from "../../src/server";

describe("server smoke", () => {
  it("responds with the watcher status", () => {
    const server = createServer(() => ({ watermark: 4242, inFlight: 3, queued: 1 }));
    const handler = server.listeners("request")[0] as ((req: unknown, res: unknown) => void) | undefined;

    expect(typeof handler).toBe("function");

    const response = {
      writeHead: jest.fn(),
      end: jest.fn()
    };

    handler?.({}, response);

    expect(response.writeHead).toHaveBeenCalledWith(200, { "content-type": "application/json" });
    expect(response.end).toHaveBeenCalledWith(JSON.stringify({ ok: true, watermark: 4242, inFlight: 3, queued: 1 }));

    server.close();
  });

  it("reports a null watermark before the poller is initialized", () => {
    const server = createServer(() => ({ watermark: null, inFlight: 0, queued: 0 }));
    const handler = server.listeners("request")[0] as ((req: unknown, res: unknown) => void) | undefined;
    const response = { writeHead: jest.fn(), end: jest.fn() };

    handler?.({}, response);

    expect(response.end).toHaveBeenCalledWith('{"ok":true,"watermark":null,"inFlight":0,"queued":0}');
    server.close();
  });
});

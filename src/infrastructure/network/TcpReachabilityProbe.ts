import { Socket } from "net";
import type { ProbeOutcome, ReachabilityProbe } from "../../ports/ReachabilityProbe";

/**
 * One TCP connect attempt against the instance's service port.
 * A refused or timed-out connect is a definitive "not reachable" for this cycle.
 */
export class TcpReachabilityProbe implements ReachabilityProbe {
  constructor(
    private readonly port = 1300,
    private readonly timeoutMs = 5000
  ) {}

  probe(address: string): Promise<ProbeOutcome> {
    return new Promise<ProbeOutcome>((resolve) => {
      const socket = new Socket();
      let settled = false;

      const finish = (outcome: ProbeOutcome) => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve(outcome);
      };

      socket.setTimeout(this.timeoutMs);
      socket.once("connect", () => finish({ reachable: true }));
      socket.once("timeout", () =>
        finish({ reachable: false, reason: `connect to ${address}:${this.port} timed out after ${this.timeoutMs}ms` })
      );
      socket.once("error", (err) =>
        finish({ reachable: false, reason: `connect to ${address}:${this.port} failed: ${err.message}` })
      );

      socket.connect({ host: address, port: this.port });
    });
  }
}

export type ProbeOutcome =
  | { reachable: true }
  | { reachable: false; reason: string };

export interface ReachabilityProbe {
  probe(address: string): Promise<ProbeOutcome>;
}

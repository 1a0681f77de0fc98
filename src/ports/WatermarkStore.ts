/**
 * Optional durable cursor for the block poller.
 * Implementations must never move a stored value backwards.
 */
export interface WatermarkStore {
  load(): Promise<number | undefined>;
  save(block: number): Promise<void>;
}

export type LimiterStats = {
  active: number;
  queued: number;
};

export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  stats(): LimiterStats;
  /** Resolves once nothing is running and nothing is queued. */
  onIdle(): Promise<void>;
};

/**
 * FIFO concurrency limiter. Tasks beyond `concurrency` wait in an unbounded queue,
 * so callers enqueueing work never block on running tasks.
 *
 *   const limit = createLimiter(10);
 *   void limit(() => verify(task)).catch(report);
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];
  let idleWaiters: Array<() => void> = [];

  const settleIdle = () => {
    if (active > 0 || queue.length > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  };

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  const limit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
          settleIdle();
        }
      });
      next();
    });

  const stats = (): LimiterStats => ({ active, queued: queue.length });

  const onIdle = (): Promise<void> => {
    if (active === 0 && queue.length === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      idleWaiters.push(resolve);
    });
  };

  return Object.assign(limit, { stats, onIdle });
};

/**
 * Concurrency limiter
 * Runs async tasks in FIFO order with at most `max` of them in flight.
 * Used to bound outstanding fallback geocoding requests.
 */

export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

export function createLimiter(max: number): Limiter {
  const limit = Math.max(1, Math.floor(max));
  // Each entry settles its caller's promise and never rejects itself
  const queue: Array<() => Promise<void>> = [];
  let active = 0;

  function next(): void {
    while (active < limit && queue.length > 0) {
      const task = queue.shift();
      if (!task) return;
      active++;
      void task().finally(() => {
        active--;
        next();
      });
    }
  }

  return <T>(fn: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => Promise.resolve().then(fn).then(resolve, reject));
      next();
    });
}

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `fn` with a wall-clock budget. The signal handed to `fn` is aborted
 * when the budget runs out, and the returned promise rejects with a
 * TimeoutError whether or not `fn` honours the signal.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const ctrl = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => {
      ctrl.abort(new TimeoutError(label, timeoutMs));
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
    fn(ctrl.signal)
      .then((v) => {
        clearTimeout(t);
        resolve(v);
      })
      .catch((e: unknown) => {
        clearTimeout(t);
        reject(e);
      });
  });
}

/**
 * Applies `fn` to every item, at most `size` at a time, chunk after chunk.
 * Results keep input order.
 */
export async function settleInChunks<T, R>(
  items: readonly T[],
  size: number,
  fn: (item: T, index: number) => Promise<R>,
  shouldStop?: () => boolean
): Promise<PromiseSettledResult<R>[]> {
  const out: PromiseSettledResult<R>[] = [];
  const step = Math.max(1, size);
  for (let i = 0; i < items.length; i += step) {
    if (shouldStop?.()) break;
    const chunk = items.slice(i, i + step);
    out.push(...(await Promise.allSettled(chunk.map((it, j) => fn(it, i + j)))));
  }
  return out;
}

/**
 * Serialises async work per key inside this process. Work on different keys
 * runs freely.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release = () => {};
    const held = new Promise<void>((r) => {
      release = r;
    });
    const tail = prev.then(() => held);
    this.tails.set(key, tail);
    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get size() {
    return this.tails.size;
  }
}

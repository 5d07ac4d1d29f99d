/**
 * Minimal async mutex: callbacks passed to `runExclusive` run one at a time,
 * in call order.
 */
export interface Mutex {
  runExclusive<T>(task: () => Promise<T>): Promise<T>;
}

export function createMutex(): Mutex {
  let locked = false;
  const queue: Array<() => void> = [];

  const acquire = (): Promise<void> =>
    new Promise(resolve => {
      if (!locked) {
        locked = true;
        resolve();
      } else {
        queue.push(resolve);
      }
    });

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      locked = false;
    }
  };

  return {
    async runExclusive<T>(task: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await task();
      } finally {
        release();
      }
    },
  };
}

/**
 * Task submission: submit work, then drain to collect settled results in
 * submission order. A rejected task never cancels or delays the others.
 */
export interface TaskRunner<T> {
  submit(task: () => Promise<T>): void;
  drain(): Promise<PromiseSettledResult<T>[]>;
}

async function settle<T>(task: () => Promise<T>): Promise<PromiseSettledResult<T>> {
  try {
    return { status: 'fulfilled', value: await task() };
  } catch (reason) {
    return { status: 'rejected', reason };
  }
}

/** Runs tasks one at a time, in order, when drained. */
export class SequentialRunner<T> implements TaskRunner<T> {
  private readonly queue: Array<() => Promise<T>> = [];

  submit(task: () => Promise<T>): void {
    this.queue.push(task);
  }

  async drain(): Promise<PromiseSettledResult<T>[]> {
    const results: PromiseSettledResult<T>[] = [];
    while (this.queue.length > 0) {
      const task = this.queue.shift();
      if (task) results.push(await settle(task));
    }
    return results;
  }
}

/** Starts tasks as they are submitted, keeping at most `concurrency` in flight. */
export class PooledRunner<T> implements TaskRunner<T> {
  private readonly pending: Array<() => void> = [];
  private readonly results: Array<Promise<PromiseSettledResult<T>>> = [];
  private active = 0;

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  submit(task: () => Promise<T>): void {
    this.results.push(
      new Promise<PromiseSettledResult<T>>((resolve) => {
        const start = () => {
          this.active++;
          void settle(task).then((result) => {
            this.active--;
            this.pending.shift()?.();
            resolve(result);
          });
        };
        if (this.active < this.concurrency) start();
        else this.pending.push(start);
      }),
    );
  }

  async drain(): Promise<PromiseSettledResult<T>[]> {
    const settled = await Promise.all(this.results);
    this.results.length = 0;
    return settled;
  }
}

export function createTaskRunner<T>(concurrency: number): TaskRunner<T> {
  return concurrency <= 1 ? new SequentialRunner<T>() : new PooledRunner<T>(concurrency);
}

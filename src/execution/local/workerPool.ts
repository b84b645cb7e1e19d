/** Bounded FIFO pool: at most `size` tasks run at once. */
export class WorkerPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) throw new Error(`worker pool size must be an integer >= 1, got ${size}`);
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active += 1;
        void task()
          .then(resolve, reject)
          .finally(() => {
            this.active -= 1;
            this.next();
          });
      };
      if (this.active < this.size) start();
      else this.queue.push(start);
    });
  }

  private next(): void {
    if (this.active >= this.size) return;
    const start = this.queue.shift();
    if (start) start();
  }
}

export type Task<T> = () => Promise<T>;

/**
 * Caps how many tasks run at once. Tasks queue in submission order and
 * start as soon as a slot frees up; each caller gets its own task's result.
 */
export class TaskPool {
  private readonly concurrency: number;

  private active = 0;

  private queue: Array<() => void> = [];

  constructor(concurrency: number) {
    this.concurrency = Math.max(1, Math.floor(concurrency));
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  activeCount(): number {
    return this.active;
  }

  pendingCount(): number {
    return this.queue.length;
  }

  run<T>(task: Task<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.active += 1;
        Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.active -= 1;
            this.drain();
          });
      });
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const start = this.queue.shift();
      if (start) {
        start();
      }
    }
  }
}

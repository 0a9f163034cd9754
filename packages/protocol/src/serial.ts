/**
 * Runs async jobs strictly one after another, in submission order.
 * Each caller gets its own job's result; a failing job does not stop the queue.
 */
export class SerialQueue {
  private queue: Array<() => Promise<void>> = [];
  private running = false;

  run<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => Promise.resolve().then(job).then(resolve, reject));
      void this.drain();
    });
  }

  /** Jobs waiting behind the one currently running */
  get length(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.running;
  }

  private async drain() {
    if (this.running) return;
    this.running = true;
    while (this.queue.length > 0) {
      const job = this.queue.shift();
      if (job) await job();
    }
    this.running = false;
  }
}

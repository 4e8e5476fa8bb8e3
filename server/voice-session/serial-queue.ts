/**
 * Runs tasks one at a time in submission order. A failing task is logged and
 * does not stop the ones queued behind it. After `close()` queued tasks are
 * skipped.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private pending = 0;

  constructor(private readonly label: string) {}

  get size(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  enqueue(name: string, task: () => Promise<void> | void): Promise<void> {
    this.pending += 1;
    const run = this.tail.then(async () => {
      try {
        if (this.closed) return;
        await task();
      } catch (error) {
        console.error(`[${this.label}] Task "${name}" failed:`, error);
      } finally {
        this.pending -= 1;
      }
    });
    this.tail = run;
    return run;
  }

  /** Resolves once everything queued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }

  close(): void {
    this.closed = true;
  }
}

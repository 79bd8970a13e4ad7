/**
 * Counting admission gate.
 *
 * Bounds how many async tasks may hold a slot at once. Waiters are admitted in
 * arrival order as slots are released. Closing the gate turns away every
 * queued and later waiter with `null` instead of a release function; slots
 * already handed out stay valid until released.
 */

export type Release = () => void;

type Waiter = (release: Release | null) => void;

export class AdmissionGate {
  private active = 0;
  private peak = 0;
  private closed = false;
  private readonly queue: Waiter[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Admission gate limit must be a positive integer, got ${limit}`);
    }
  }

  acquire(): Promise<Release | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    if (this.active < this.limit) {
      // Increment before handing out the slot so synchronous callers cannot overshoot
      this.occupy();
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release | null>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Run a task inside a slot. Resolves to `null` without running the task
   * when the gate closes before a slot frees up.
   */
  async run<T>(task: () => Promise<T>): Promise<T | null> {
    const release = await this.acquire();
    if (!release) {
      return null;
    }
    try {
      return await task();
    } finally {
      release();
    }
  }

  // Stop admitting: queued waiters resolve to null, as does every later acquire
  close(): void {
    this.closed = true;
    for (const waiter of this.queue.splice(0)) {
      waiter(null);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): { active: number; waiting: number; limit: number; peak: number } {
    return {
      active: this.active,
      waiting: this.queue.length,
      limit: this.limit,
      peak: this.peak,
    };
  }

  private occupy(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active--;

      const next = this.queue.shift();
      if (next) {
        this.occupy();
        next(this.createRelease());
      }
    };
  }
}

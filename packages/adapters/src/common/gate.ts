import PQueue from 'p-queue';

export type GateTask<T> = () => Promise<T>;

/**
 * Process-wide ceiling on concurrent provider calls. The underlying queue is
 * created on the first `run()`, so a gate that is never used costs nothing.
 */
export class ConcurrencyGate {
  private queue: PQueue | null = null;

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  get initialized(): boolean {
    return this.queue !== null;
  }

  /** Tasks currently running */
  get active(): number {
    return this.queue?.pending ?? 0;
  }

  /** Tasks waiting for a slot */
  get waiting(): number {
    return this.queue?.size ?? 0;
  }

  run<T>(task: GateTask<T>): Promise<T> {
    this.queue ??= new PQueue({ concurrency: this.limit });
    return this.queue.add(task, { throwOnTimeout: true });
  }

  /** Resolves once nothing is running or waiting. */
  async drain(): Promise<void> {
    if (this.queue) await this.queue.onIdle();
  }
}

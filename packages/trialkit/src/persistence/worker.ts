import { PersistenceError, UninitializedUseError } from '../errors.js';

export type WriteJob = () => void | Promise<void>;

interface JobFailure {
  seq: number;
  error: unknown;
}

/**
 * FIFO executor for write jobs. Jobs run one at a time, chained on a single
 * promise, so job N has settled before job N+1 starts. `submit` never waits.
 *
 * A failing job does not stop the queue; its error is held until the next
 * `drain()` that covers it, which rejects with a PersistenceError once every
 * job it waited for has run.
 */
export class PersistenceWorker {
  private tail: Promise<void> = Promise.resolve();
  private active = false;
  private submitted = 0;
  private completed = 0;
  private failures: JobFailure[] = [];

  get isActive(): boolean {
    return this.active;
  }

  /** Jobs submitted but not yet settled. */
  get pendingJobs(): number {
    return this.submitted - this.completed;
  }

  begin(): void {
    this.active = true;
  }

  submit(job: WriteJob): void {
    if (!this.active) {
      throw new UninitializedUseError('Cannot queue a write job before the persistence worker has begun');
    }
    const seq = ++this.submitted;
    this.tail = this.tail.then(async () => {
      try {
        await job();
      } catch (error: unknown) {
        this.failures.push({ seq, error });
      } finally {
        this.completed++;
      }
    });
  }

  /**
   * Resolve once every job submitted before this call has run. Jobs queued
   * afterwards are not waited for.
   */
  async drain(): Promise<void> {
    const bound = this.submitted;
    const until = this.tail;
    await until;

    const covered = this.failures.filter(f => f.seq <= bound);
    if (covered.length === 0) return;
    this.failures = this.failures.filter(f => f.seq > bound);
    throw new PersistenceError(covered.map(f => f.error));
  }

  /** Drain, then stop accepting jobs until the next begin(). */
  async end(): Promise<void> {
    try {
      await this.drain();
    } finally {
      this.active = false;
    }
  }
}

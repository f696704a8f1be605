/**
 * Job Lock Manager
 * Keeps at most one execution per job id in flight inside this process
 */

export interface LockResult<T> {
  acquired: boolean;
  result?: T;
  reason?: string;
}

export class JobLockManager {
  private readonly held = new Set<string>();

  isHeld(jobId: string): boolean {
    return this.held.has(jobId);
  }

  /**
   * Run `fn` while holding the lock for `jobId`.
   * Fails fast: a held lock means the caller skips this run, it never waits.
   * Errors from `fn` are rethrown after the lock is released.
   */
  async processWithLock<T>(jobId: string, fn: () => Promise<T>): Promise<LockResult<T>> {
    if (this.held.has(jobId)) {
      return {
        acquired: false,
        reason: `Job ${jobId} is already running`
      };
    }

    this.held.add(jobId);
    try {
      const result = await fn();
      return {
        acquired: true,
        result
      };
    } finally {
      this.held.delete(jobId);
    }
  }
}

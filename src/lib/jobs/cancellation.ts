/**
 * Per-process cancellation signals, one per running job. A cancel only
 * reaches a runner in this process; queued jobs are cancelled through the
 * job store instead.
 */
export class CancellationRegistry {
  private controllers = new Map<string, AbortController>();

  register(jobId: string): AbortSignal {
    const existing = this.controllers.get(jobId);
    if (existing) return existing.signal;
    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    return controller.signal;
  }

  /** Returns false when no runner in this process holds the job. */
  cancel(jobId: string): boolean {
    const controller = this.controllers.get(jobId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  release(jobId: string) {
    this.controllers.delete(jobId);
  }

  has(jobId: string): boolean {
    return this.controllers.has(jobId);
  }
}

import { TimeoutFailure } from '@/lib/errors';

/**
 * Wall-clock budget for one job. When it runs out, `signal` aborts and any
 * wait passed through `race` rejects with a TimeoutFailure, even if the
 * collaborator ignores the signal.
 */
export class JobDeadline {
  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout>;
  private expired: TimeoutFailure | null = null;

  constructor(readonly budgetMs: number) {
    this.timer = setTimeout(() => {
      this.expired = new TimeoutFailure(budgetMs);
      this.controller.abort();
    }, budgetMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  check() {
    if (this.expired) throw this.expired;
  }

  race<T>(work: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const signal = this.controller.signal;
      const onExpire = () => reject(this.expired ?? new TimeoutFailure(this.budgetMs));
      if (signal.aborted) {
        onExpire();
        return;
      }
      signal.addEventListener('abort', onExpire, { once: true });
      void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onExpire));
    });
  }

  clear() {
    clearTimeout(this.timer);
  }
}

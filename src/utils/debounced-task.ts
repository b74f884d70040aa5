/**
 * Debounced Task - coalesces rapid trigger() calls into one delayed run
 *
 * Every trigger() restarts the delay. When it expires the task runs once;
 * a trigger arriving while the task is running schedules one more run after
 * it completes, so the last request is never lost.
 *
 * The task is responsible for its own error handling; a rejection is passed
 * to `onError` and never escapes the timer.
 */

export interface DebouncedTaskOptions {
  delayMs: number;
  onError: (error: unknown) => void;
}

export interface DebouncedTaskStats {
  /** trigger() calls received */
  requests: number;
  /** Times the task actually ran */
  runs: number;
  /** Triggers absorbed by a later trigger */
  coalesced: number;
  /** Runs that rejected */
  failures: number;
}

export class DebouncedTask {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private rerunRequested = false;
  private stats: DebouncedTaskStats = { requests: 0, runs: 0, coalesced: 0, failures: 0 };

  constructor(
    private readonly task: () => Promise<void>,
    private readonly options: DebouncedTaskOptions
  ) {}

  trigger(): void {
    this.stats.requests++;

    if (this.timer) {
      clearTimeout(this.timer);
      this.stats.coalesced++;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.launch();
    }, this.options.delayMs);
  }

  /**
   * Run a pending trigger now and wait for every in-progress run.
   */
  async flush(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.launch();
    }

    while (this.running) {
      await this.running;
    }
  }

  /**
   * Drop a pending trigger without running it.
   */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.rerunRequested = false;
  }

  get isPending(): boolean {
    return this.timer !== null || this.running !== null;
  }

  getStats(): DebouncedTaskStats {
    return { ...this.stats };
  }

  private launch(): void {
    if (this.running) {
      this.rerunRequested = true;
      return;
    }

    this.running = this.execute().finally(() => {
      this.running = null;
      if (this.rerunRequested) {
        this.rerunRequested = false;
        this.launch();
      }
    });
  }

  private async execute(): Promise<void> {
    this.stats.runs++;
    try {
      await this.task();
    } catch (error) {
      this.stats.failures++;
      this.options.onError(error);
    }
  }
}

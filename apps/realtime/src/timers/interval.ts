/**
 * Repeating timer with explicit start/stop.
 *
 * Used for delay probes (per connection) and the periodic FULL_STATE
 * broadcast (per authority). An async tick that rejects is reported to
 * `onError`; ticks never overlap.
 */

export interface IntervalTimerOptions {
  /** Tag used in log lines, e.g. "probe" */
  name: string;
  intervalMs: number;
  /** Also tick once right away on start */
  immediate?: boolean;
  onError?: (error: unknown) => void;
}

export class IntervalTimer {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(
    private readonly tick: () => void | Promise<void>,
    private readonly options: IntervalTimerOptions
  ) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    // Don't start if already running
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.run(), this.options.intervalMs);
    if (this.options.immediate) {
      this.run();
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private run(): void {
    if (this.ticking) {
      return;
    }
    this.ticking = true;

    let result: void | Promise<void>;
    try {
      result = this.tick();
    } catch (error) {
      this.ticking = false;
      this.report(error);
      return;
    }

    if (result instanceof Promise) {
      result.then(
        () => {
          this.ticking = false;
        },
        (error: unknown) => {
          this.ticking = false;
          this.report(error);
        }
      );
    } else {
      this.ticking = false;
    }
  }

  private report(error: unknown): void {
    if (this.options.onError) {
      this.options.onError(error);
    } else {
      console.error(`[${this.options.name}] tick failed:`, error);
    }
  }
}

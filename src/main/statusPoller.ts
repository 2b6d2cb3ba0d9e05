export interface StatusPollerOptions {
  intervalMs: number;
  tick: () => Promise<void>;
  onError: (error: unknown) => void;
}

/**
 * Fixed-delay polling: the next tick is scheduled once the previous one has
 * settled, so ticks never overlap. A `stop()` issued during a tick holds.
 */
export class StatusPoller {
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(private options: StatusPollerOptions) {}

  get intervalMs(): number {
    return this.options.intervalMs;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(intervalMs?: number): void {
    if (intervalMs !== undefined) {
      this.options.intervalMs = intervalMs;
    }
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.run();
    }, this.options.intervalMs);
  }

  private async run(): Promise<void> {
    try {
      await this.options.tick();
    } catch (err) {
      this.options.onError(err);
    }
    if (this.running && !this.timer) {
      this.schedule();
    }
  }
}

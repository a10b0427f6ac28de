/**
 * Rebuild Scheduler
 * Debounces rebuild requests and runs at most one rebuild at a time
 */

export interface RebuildSchedulerOptions {
  // Quiet period in milliseconds before a burst of requests starts a rebuild
  delay: number;
  run: () => Promise<void>;
  onError: (error: unknown) => void;
}

export class RebuildScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private pending = false;

  constructor(private readonly options: RebuildSchedulerOptions) {}

  /**
   * Ask for a rebuild. Requests within the delay collapse into one; a request
   * made while a rebuild runs queues a single follow-up rebuild.
   */
  request(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.options.delay);
  }

  /**
   * Resolves once no rebuild is running
   */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  /**
   * Drop the waiting request and any queued follow-up
   */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending = false;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  private flush(): void {
    if (this.running) {
      this.pending = true;
      return;
    }
    this.running = this.drain();
  }

  private async drain(): Promise<void> {
    try {
      do {
        this.pending = false;
        try {
          await this.options.run();
        } catch (error) {
          this.options.onError(error);
        }
      } while (this.pending);
    } finally {
      this.running = null;
    }
  }
}

import type { Logger } from "./logger.js";

/**
 * Runs `task` every `intervalMs`, never overlapping itself. A failing cycle is
 * logged and the next one still runs.
 */
export class PollLoop {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private stopped = true;

  constructor(
    private readonly args: { name: string; intervalMs: number; task: () => Promise<unknown>; log: Logger }
  ) {}

  get active(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.args.log.info({ loop: this.args.name, intervalMs: this.args.intervalMs }, "poll: started");
    this.schedule(0);
  }

  private schedule(ms: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.running = this.tick().finally(() => {
        this.running = null;
        if (!this.stopped) this.schedule(this.args.intervalMs);
      });
    }, ms);
  }

  async tick(): Promise<void> {
    try {
      await this.args.task();
    } catch (err) {
      this.args.log.error({ err, loop: this.args.name }, "poll: cycle failed");
    }
  }

  /** Stops scheduling and waits for an in-flight cycle to finish. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (this.running) await this.running;
    this.args.log.info({ loop: this.args.name }, "poll: stopped");
  }
}

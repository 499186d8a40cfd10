import { PollLoop } from "../lib/poll.js";
import { componentLogger, type Logger } from "../lib/logger.js";

export type PollStats = { seen: number; created: number; failed: number };

/**
 * Perception adapter skeleton: find candidate items, turn each into an Intake
 * record. A failure on one item is logged and does not stop the rest.
 */
export abstract class BaseWatcher<T> {
  protected readonly log: Logger;
  private loop: PollLoop;

  constructor(args: { name: string; intervalMs: number; logger?: Logger }) {
    this.log = componentLogger(args.logger, args.name);
    this.loop = new PollLoop({ name: args.name, intervalMs: args.intervalMs, task: () => this.pollOnce(), log: this.log });
  }

  protected abstract checkForUpdates(): Promise<T[]>;

  /** Returns false when the item had been ingested before. */
  protected abstract createItem(item: T): Promise<boolean>;

  protected abstract describe(item: T): string;

  async pollOnce(): Promise<PollStats> {
    const items = await this.checkForUpdates();
    const stats: PollStats = { seen: items.length, created: 0, failed: 0 };
    for (const item of items) {
      try {
        if (await this.createItem(item)) stats.created++;
      } catch (err) {
        stats.failed++;
        this.log.error({ err, item: this.describe(item) }, "watcher: item failed");
      }
    }
    if (stats.created || stats.failed) this.log.info(stats, "watcher: poll finished");
    return stats;
  }

  start(): void {
    this.loop.start();
  }

  stop(): Promise<void> {
    return this.loop.stop();
  }
}

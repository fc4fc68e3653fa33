import { logger } from "../logger";
import type { ConversationStore } from "./store";

export const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

/** Calls `sweepExpired` on a fixed interval. Owned by the host, not the store. */
export class ConversationSweeper {
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly store: ConversationStore) {}

  get running(): boolean {
    return this.intervalId !== null;
  }

  runOnce(): number {
    const removed = this.store.sweepExpired();
    if (removed > 0) {
      logger.info(`Conversation sweep removed ${removed} expired conversation(s)`);
    }
    return removed;
  }

  start(intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS): void {
    if (this.intervalId) {
      return;
    }
    this.intervalId = setInterval(() => {
      this.runOnce();
    }, intervalMs);
    this.intervalId.unref();
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConversationStore } from "./store";
import { ConversationSweeper } from "./sweeper";

describe("ConversationSweeper", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("sweeps on every interval until stopped", () => {
    const store = new ConversationStore({ maxAgeMs: 1_000 });
    const sweeper = new ConversationSweeper(store);
    store.create();

    sweeper.start(500);
    expect(sweeper.running).toBe(true);

    vi.advanceTimersByTime(1_000);
    expect(store.size).toBe(1);

    vi.advanceTimersByTime(500);
    expect(store.size).toBe(0);

    sweeper.stop();
    expect(sweeper.running).toBe(false);
    store.create();
    vi.advanceTimersByTime(10_000);
    expect(store.size).toBe(1);
  });

  it("reports how many conversations a manual run removed", () => {
    const store = new ConversationStore({ maxAgeMs: 10 });
    const sweeper = new ConversationSweeper(store);
    store.create();
    store.create();
    vi.setSystemTime(11);

    expect(sweeper.runOnce()).toBe(2);
  });
});

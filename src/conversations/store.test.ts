import { describe, expect, it } from "vitest";
import { ConversationNotFoundError } from "../protocol";
import { ConversationStore, hoursToMs } from "./store";

function manualClock(start = 1_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("ConversationStore", () => {
  it("creates empty conversations with matching timestamps", () => {
    const clock = manualClock();
    const store = new ConversationStore({ now: clock.now });

    const conversation = store.create();

    expect(conversation.messages).toEqual([]);
    expect(conversation.metadata).toEqual({});
    expect(conversation.createdAt).toBe(1_000);
    expect(conversation.updatedAt).toBe(1_000);
    expect(store.size).toBe(1);
    expect(store.listIds()).toEqual([conversation.id]);
  });

  it("records an exchange in order", () => {
    const clock = manualClock();
    const store = new ConversationStore({ now: clock.now });
    const { id } = store.create();

    clock.advance(10);
    store.appendMessage(id, "user", "hi");
    clock.advance(10);
    store.appendMessage(id, "assistant", "hello");

    const conversation = store.get(id);
    expect(conversation?.messages).toEqual([
      { role: "user", content: "hi", timestamp: 1_010 },
      { role: "assistant", content: "hello", timestamp: 1_020 },
    ]);
    expect(conversation?.updatedAt).toBe(1_020);
  });

  it("keeps every one of many concurrent appends", async () => {
    const store = new ConversationStore();
    const { id } = store.create();

    await Promise.all(
      Array.from({ length: 50 }, (_, index) =>
        Promise.resolve().then(() => store.appendMessage(id, "user", `m${index}`)),
      ),
    );

    const messages = store.get(id)?.messages ?? [];
    expect(messages).toHaveLength(50);
    expect(new Set(messages.map((message) => message.content)).size).toBe(50);
  });

  it("hands out copies that do not alias stored state", () => {
    const store = new ConversationStore();
    const { id } = store.create();
    const snapshot = store.get(id);
    snapshot?.messages.push({ role: "user", content: "leak", timestamp: 0 });

    store.appendMessage(id, "user", "real");

    expect(store.get(id)?.messages.map((message) => message.content)).toEqual(["real"]);
    expect(snapshot?.messages.map((message) => message.content)).toEqual(["leak"]);
  });

  it("never moves updatedAt backwards", () => {
    const clock = manualClock(5_000);
    const store = new ConversationStore({ now: clock.now });
    const created = store.create();

    const updated = store.update({ ...created, updatedAt: 100, metadata: { topic: "x" } });

    expect(updated.updatedAt).toBe(5_000);
    expect(store.get(created.id)?.metadata).toEqual({ topic: "x" });
  });

  it("inserts on update of an unknown id", () => {
    const store = new ConversationStore({ now: () => 42 });

    store.update({ id: "fixed", messages: [], metadata: {}, createdAt: 1, updatedAt: 1 });

    expect(store.get("fixed")).toEqual({
      id: "fixed",
      messages: [],
      metadata: {},
      createdAt: 1,
      updatedAt: 42,
    });
  });

  it("sets metadata and bumps updatedAt", () => {
    const clock = manualClock();
    const store = new ConversationStore({ now: clock.now });
    const { id } = store.create();
    clock.advance(5);

    store.setMetadata(id, "user", "alice");

    expect(store.get(id)).toMatchObject({ metadata: { user: "alice" }, updatedAt: 1_005 });
  });

  it("throws for unknown ids on mutation", () => {
    const store = new ConversationStore();

    expect(() => store.appendMessage("missing", "user", "x")).toThrow(ConversationNotFoundError);
    expect(() => store.setMetadata("missing", "k", "v")).toThrow("Conversation missing not found");
    expect(store.delete("missing")).toBe(false);
  });

  it("sweeps only conversations idle past the max age", () => {
    const clock = manualClock(0);
    const store = new ConversationStore({ maxAgeMs: hoursToMs(1), now: clock.now });
    const old = store.create();
    clock.advance(hoursToMs(1));
    const boundary = store.create();
    clock.advance(1);

    expect(store.sweepExpired()).toBe(1);
    expect(store.get(old.id)).toBeUndefined();
    expect(store.get(boundary.id)).toBeDefined();
  });

  it("keeps conversations whose activity is recent", () => {
    const clock = manualClock(0);
    const store = new ConversationStore({ maxAgeMs: 1_000, now: clock.now });
    const { id } = store.create();
    clock.advance(900);
    store.appendMessage(id, "user", "still here");
    clock.advance(900);

    expect(store.sweepExpired()).toBe(0);
    expect(store.size).toBe(1);
  });
});

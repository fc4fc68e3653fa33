import crypto from "node:crypto";
import { logger } from "../logger";
import { ConversationNotFoundError } from "../protocol";
import type { Conversation } from "./types";

export const DEFAULT_CONVERSATION_MAX_AGE_HOURS = 24;

export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}

export interface ConversationStoreOptions {
  maxAgeMs?: number;
  now?: () => number;
}

/**
 * In-memory conversation log keyed by id.
 *
 * The map owns every Conversation; callers only ever see copies. Each public
 * method runs to completion without yielding, so it is one critical section:
 * `appendMessage` and `setMetadata` are atomic read-modify-writes, while
 * `get` + edit + `update` is not and the last `update` wins.
 */
export class ConversationStore {
  private conversations = new Map<string, Conversation>();
  readonly maxAgeMs: number;
  private readonly now: () => number;

  constructor(options: ConversationStoreOptions = {}) {
    this.maxAgeMs = options.maxAgeMs ?? hoursToMs(DEFAULT_CONVERSATION_MAX_AGE_HOURS);
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.conversations.size;
  }

  listIds(): string[] {
    return Array.from(this.conversations.keys());
  }

  create(): Conversation {
    const now = this.now();
    const conversation: Conversation = {
      id: crypto.randomUUID(),
      messages: [],
      metadata: {},
      createdAt: now,
      updatedAt: now,
    };
    this.conversations.set(conversation.id, conversation);
    return structuredClone(conversation);
  }

  get(id: string): Conversation | undefined {
    const conversation = this.conversations.get(id);
    return conversation ? structuredClone(conversation) : undefined;
  }

  /** Overwrites (or inserts) the entry for `conversation.id` wholesale. */
  update(conversation: Conversation): Conversation {
    const current = this.conversations.get(conversation.id);
    const next = structuredClone(conversation);
    next.updatedAt = Math.max(next.updatedAt, current?.updatedAt ?? 0, this.now());
    this.conversations.set(next.id, next);
    return structuredClone(next);
  }

  appendMessage(id: string, role: string, content: string): void {
    const conversation = this.require(id);
    const timestamp = this.bump(conversation);
    conversation.messages.push({ role, content, timestamp });
  }

  setMetadata(id: string, key: string, value: string): void {
    const conversation = this.require(id);
    conversation.metadata[key] = value;
    this.bump(conversation);
  }

  delete(id: string): boolean {
    return this.conversations.delete(id);
  }

  /** Removes every conversation idle for longer than `maxAgeMs`. */
  sweepExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, conversation] of this.conversations) {
      if (now - conversation.updatedAt > this.maxAgeMs) {
        this.conversations.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) {
      logger.debug({ removed, remaining: this.conversations.size }, "Swept expired conversations");
    }
    return removed;
  }

  private require(id: string): Conversation {
    const conversation = this.conversations.get(id);
    if (!conversation) {
      throw new ConversationNotFoundError(id);
    }
    return conversation;
  }

  private bump(conversation: Conversation): number {
    const timestamp = Math.max(this.now(), conversation.updatedAt);
    conversation.updatedAt = timestamp;
    return timestamp;
  }
}

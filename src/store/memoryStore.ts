import { ConfigurationError } from "../errors";
import type { Message } from "../types";
import {
  type ChatStore,
  type ConversationKey,
  ThreadState,
  messageKey,
} from "./chatStore";

export interface MemoryStoreConfig {
  maxConversations: number;
  maxMessagesPerConversation: number;
}

/**
 * In-memory ChatStore bounded on two axes: the number of conversations and the
 * number of messages kept per conversation.
 *
 * Conversations live in a Map whose iteration order is activity order: every
 * `add` re-inserts its key at the end, so the first key is always the
 * least-recently-active conversation, and among conversations that were never
 * touched again the one created first. That key is evicted when a new
 * conversation arrives at capacity.
 *
 * Activity is measured by arrival at the store, not by the platform timestamp
 * on the message, so clock skew between platforms cannot reorder eviction.
 *
 * `add` does all of its reading and writing without yielding to the event
 * loop, which makes each call atomic with respect to every other call.
 */
export class MemoryStore implements ChatStore {
  private readonly threads = new Map<ConversationKey, Message[]>();
  private readonly maxConversations: number;
  private readonly maxMessagesPerConversation: number;

  constructor(config: MemoryStoreConfig) {
    assertCapacity("maxConversations", config.maxConversations);
    assertCapacity(
      "maxMessagesPerConversation",
      config.maxMessagesPerConversation,
    );
    this.maxConversations = config.maxConversations;
    this.maxMessagesPerConversation = config.maxMessagesPerConversation;
  }

  async add(message: Message): Promise<ThreadState> {
    return this.addNow(message);
  }

  async get(key: ConversationKey): Promise<ThreadState | undefined> {
    const thread = this.threads.get(key);
    return thread ? new ThreadState(key, thread) : undefined;
  }

  async size(): Promise<number> {
    return this.threads.size;
  }

  private addNow(message: Message): ThreadState {
    const key = messageKey(message);
    let thread = this.threads.get(key);

    if (thread) {
      // Move to the back of the activity order
      this.threads.delete(key);
    } else {
      if (this.threads.size >= this.maxConversations) this.evictOne();
      thread = [];
    }
    this.threads.set(key, thread);

    thread.push(message);
    const overflow = thread.length - this.maxMessagesPerConversation;
    if (overflow > 0) thread.splice(0, overflow);

    return new ThreadState(key, thread);
  }

  private evictOne(): void {
    const oldest = this.threads.keys().next();
    if (!oldest.done) this.threads.delete(oldest.value);
  }
}

function assertCapacity(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(
      `${name} must be an integer >= 1, got ${value}`,
    );
  }
}

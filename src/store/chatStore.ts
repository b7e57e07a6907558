import type { Identifier, Message } from "../types";

declare const conversationKeyBrand: unique symbol;

/** Unordered participant pair; {a, b} and {b, a} produce the same key */
export type ConversationKey = string & { readonly [conversationKeyBrand]: true };

export function conversationKey(a: Identifier, b: Identifier): ConversationKey {
  const [first, second] = a <= b ? [a, b] : [b, a];
  return `${first.length}:${first}|${second}` as ConversationKey;
}

export const messageKey = (message: Message): ConversationKey =>
  conversationKey(message.senderId, message.recipientId);

/**
 * Snapshot of one conversation's history in arrival order.
 * Holds its own frozen copy; later store mutations never show through.
 */
export class ThreadState {
  readonly messages: readonly Message[];

  constructor(
    readonly key: ConversationKey,
    messages: readonly Message[],
  ) {
    if (messages.length === 0) {
      throw new RangeError("ThreadState requires at least one message");
    }
    this.messages = Object.freeze([...messages]);
  }

  get length(): number {
    return this.messages.length;
  }

  get newest(): Message {
    return this.messages[this.messages.length - 1];
  }

  /** The human participant, taken from the newest user-authored message */
  get userId(): Identifier {
    const fromUser = this.findLast((m) => m.role === "user");
    return fromUser ? fromUser.senderId : this.newest.recipientId;
  }

  private findLast(predicate: (m: Message) => boolean): Message | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const m = this.messages[i];
      if (predicate(m)) return m;
    }
    return undefined;
  }
}

/**
 * Ordered, capacity-bounded conversation storage.
 *
 * `add` calls for the same conversation key are linearizable; calls for
 * different keys may run concurrently. Eviction to stay within capacity is
 * normal operation and never surfaces as an error.
 */
export interface ChatStore {
  /** Append and return the conversation as it stands after the append */
  add(message: Message): Promise<ThreadState>;

  get(key: ConversationKey): Promise<ThreadState | undefined>;

  /** Number of conversations currently retained */
  size(): Promise<number>;
}

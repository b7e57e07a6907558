import { randomUUID } from "node:crypto";

declare const identifierBrand: unique symbol;

/** Opaque identity of a platform participant, chat or message */
export type Identifier = string & { readonly [identifierBrand]: true };

export const asIdentifier = (value: string | number): Identifier =>
  String(value) as Identifier;

export const randomIdentifier = (): Identifier => asIdentifier(randomUUID());

export type Role = "user" | "assistant" | "system";

/** Message content, platform-neutral */
export type Payload =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "image"; readonly url: string; readonly mimeType?: string };

/** One conversation turn. Frozen on construction. */
export interface Message {
  readonly messageId: Identifier;
  /** Epoch milliseconds as reported by the platform */
  readonly timestamp: number;
  readonly payload: Payload;
  readonly senderId: Identifier;
  readonly recipientId: Identifier;
  /** Platform chat/thread the message was posted in; replies are addressed here */
  readonly conversationId: Identifier;
  readonly role: Role;
}

export interface MessageInit {
  messageId?: Identifier;
  timestamp: number;
  payload: Payload;
  senderId: Identifier;
  recipientId: Identifier;
  conversationId: Identifier;
  role: Role;
}

export function createMessage(init: MessageInit): Message {
  return Object.freeze({
    messageId: init.messageId ?? randomIdentifier(),
    timestamp: init.timestamp,
    payload: Object.freeze({ ...init.payload }),
    senderId: init.senderId,
    recipientId: init.recipientId,
    conversationId: init.conversationId,
    role: init.role,
  });
}

/**
 * Build the assistant's answer to `inbound`: participants swapped, same chat,
 * and a timestamp that never precedes the message being answered.
 */
export function createReply(
  inbound: Message,
  text: string,
  now: number = Date.now(),
): Message {
  return createMessage({
    timestamp: Math.max(now, inbound.timestamp),
    payload: { kind: "text", text },
    senderId: inbound.recipientId,
    recipientId: inbound.senderId,
    conversationId: inbound.conversationId,
    role: "assistant",
  });
}

/** Plain-text rendering of a payload, used when building model context */
export function payloadText(payload: Payload): string {
  switch (payload.kind) {
    case "text":
      return payload.text;
    case "image":
      return `[image: ${payload.url}]`;
  }
}

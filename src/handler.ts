import type { ModelRequest } from "./llm/plugin";
import type { ThreadState } from "./store/chatStore";
import type { Message } from "./types";

/** The parts of an HTTP request a handler looks at. Header names are lower-case. */
export interface WebhookRequest {
  method: string;
  headers: Record<string, string | string[] | undefined>;
  query: Record<string, unknown>;
  body: unknown;
}

/**
 * Translates between one platform's payloads and canonical Messages.
 * The pipeline never branches on platform outside an implementation of this.
 */
export interface MessageHandler<TOutbound = unknown> {
  readonly platform: string;

  /**
   * Split one webhook delivery into per-event payloads.
   * Platforms that send a single event per request leave this out.
   */
  split?(raw: unknown): unknown[];

  /** Answer the platform's subscription check; null when `request` is not one */
  handshake?(request: WebhookRequest): string | null;

  /**
   * True when the platform marks `request` as a resend of a delivery it has
   * already made. Redeliveries are acknowledged without running a turn.
   */
  isRedelivery?(request: WebhookRequest): boolean;

  /**
   * Throws ParseError on a malformed payload. Returns null for well-formed
   * events that are not a user turn (the bot's own echoes, receipts, edits).
   */
  parseInbound(raw: unknown): Message | null;

  /** Context window for the model. Same thread in, same request out. */
  buildRequest(thread: ThreadState): ModelRequest;

  renderOutbound(message: Message): TOutbound;

  /** Send a rendered payload through the platform API */
  deliver(payload: TOutbound): Promise<void>;
}

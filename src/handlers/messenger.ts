import { z } from "zod";
import { ParseError } from "../errors";
import type { MessageHandler, WebhookRequest } from "../handler";
import type { ModelRequest } from "../llm/plugin";
import type { ThreadState } from "../store/chatStore";
import { type Message, type Payload, asIdentifier, createMessage, payloadText } from "../types";
import { buildContextWindow, chunkText } from "./context";

const MESSENGER_TEXT_LIMIT = 2000;

const DeliverySchema = z.object({
  object: z.literal("page"),
  entry: z.array(z.object({ messaging: z.array(z.unknown()).optional() })),
});

const MessagingEventSchema = z.object({
  sender: z.object({ id: z.string() }),
  recipient: z.object({ id: z.string() }),
  timestamp: z.number(),
  message: z
    .object({
      mid: z.string(),
      text: z.string().optional(),
      is_echo: z.boolean().optional(),
      attachments: z
        .array(
          z.object({
            type: z.string(),
            payload: z.object({ url: z.string().optional() }).nullish(),
          }),
        )
        .optional(),
    })
    .optional(),
});

export interface MessengerOutbound {
  pageId: string;
  recipientId: string;
  texts: string[];
}

interface MessengerConfig {
  page_access_token: string;
  verify_token: string;
  api_version: string;
  system_prompt?: string;
  max_context_messages?: number;
}

/** Messenger Platform webhooks in, Send API calls out */
export class MessengerHandler implements MessageHandler<MessengerOutbound> {
  readonly platform = "messenger";

  constructor(
    private messengerConfig: MessengerConfig,
    private fetchImpl: typeof fetch = fetch,
  ) {}

  handshake(request: WebhookRequest): string | null {
    if (request.method !== "GET") return null;
    const q = request.query;
    if (q["hub.mode"] !== "subscribe") return null;
    if (q["hub.verify_token"] !== this.messengerConfig.verify_token) return null;
    const challenge = q["hub.challenge"];
    return typeof challenge === "string" ? challenge : null;
  }

  /** One delivery may batch events from several pages and senders */
  split(raw: unknown): unknown[] {
    const parsed = DeliverySchema.safeParse(raw);
    if (!parsed.success) return [raw];
    return parsed.data.entry.flatMap((e) => e.messaging ?? []);
  }

  parseInbound(raw: unknown): Message | null {
    const parsed = MessagingEventSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ParseError("Not a Messenger messaging event", this.platform);
    }

    const { sender, recipient, timestamp, message } = parsed.data;
    // Reads, deliveries and postbacks carry no message; echoes are the page's own sends
    if (!message || message.is_echo) return null;

    let payload: Payload | null = null;
    if (message.text) {
      payload = { kind: "text", text: message.text };
    } else {
      const image = message.attachments?.find((a) => a.type === "image" && a.payload?.url);
      if (image?.payload?.url) payload = { kind: "image", url: image.payload.url };
    }
    if (!payload) return null;

    return createMessage({
      messageId: asIdentifier(message.mid),
      timestamp,
      payload,
      senderId: asIdentifier(sender.id),
      recipientId: asIdentifier(recipient.id),
      conversationId: asIdentifier(sender.id),
      role: "user",
    });
  }

  buildRequest(thread: ThreadState): ModelRequest {
    return buildContextWindow(thread, {
      systemPrompt: this.messengerConfig.system_prompt,
      maxContextMessages: this.messengerConfig.max_context_messages,
    });
  }

  renderOutbound(message: Message): MessengerOutbound {
    return {
      pageId: message.senderId,
      recipientId: message.recipientId,
      texts: chunkText(payloadText(message.payload), MESSENGER_TEXT_LIMIT),
    };
  }

  async deliver(payload: MessengerOutbound): Promise<void> {
    const url = new URL(
      `https://graph.facebook.com/${this.messengerConfig.api_version}/${payload.pageId}/messages`,
    );
    url.searchParams.set("access_token", this.messengerConfig.page_access_token);

    for (const text of payload.texts) {
      const resp = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          recipient: { id: payload.recipientId },
          messaging_type: "RESPONSE",
          message: { text },
        }),
      });
      if (!resp.ok) {
        const body = await resp.text().catch(() => "");
        throw new Error(`Messenger send failed: ${resp.status} ${body}`);
      }
    }
  }
}

import { WebClient } from "@slack/web-api";
import { z } from "zod";
import { ParseError } from "../errors";
import type { MessageHandler, WebhookRequest } from "../handler";
import type { ModelRequest } from "../llm/plugin";
import type { ThreadState } from "../store/chatStore";
import { type Message, asIdentifier, createMessage, payloadText } from "../types";
import { buildContextWindow, chunkText } from "./context";

const SLACK_TEXT_LIMIT = 40_000;

const UrlVerificationSchema = z.object({
  type: z.literal("url_verification"),
  challenge: z.string(),
});

const EventCallbackSchema = z.object({
  type: z.literal("event_callback"),
  event: z.object({
    type: z.string(),
    channel: z.string(),
    ts: z.string(),
    user: z.string().optional(),
    text: z.string().optional(),
    thread_ts: z.string().optional(),
    bot_id: z.string().optional(),
    subtype: z.string().optional(),
  }),
  authorizations: z.array(z.object({ user_id: z.string() })).optional(),
});

export interface SlackOutbound {
  channel: string;
  thread_ts?: string;
  texts: string[];
}

export type SlackPost = (message: {
  channel: string;
  text: string;
  thread_ts?: string;
}) => Promise<unknown>;

interface SlackConfig {
  bot_token: string;
  bot_user_id?: string;
  system_prompt?: string;
  max_context_messages?: number;
}

/**
 * Events API callbacks in, chat.postMessage out.
 * Threaded messages keep their thread: the conversation id is
 * `<channel>:<thread_ts>` and replies go back into that thread.
 * The bot is addressed as `<bot user>@<channel>`, so history stays per channel.
 */
export class SlackHandler implements MessageHandler<SlackOutbound> {
  readonly platform = "slack";
  private readonly post: SlackPost;

  constructor(
    private slackConfig: SlackConfig,
    post?: SlackPost,
  ) {
    if (post) {
      this.post = post;
    } else {
      const client = new WebClient(slackConfig.bot_token);
      this.post = ({ channel, text, thread_ts }) =>
        thread_ts
          ? client.chat.postMessage({ channel, text, thread_ts })
          : client.chat.postMessage({ channel, text });
    }
  }

  handshake(request: WebhookRequest): string | null {
    if (request.method !== "POST") return null;
    const parsed = UrlVerificationSchema.safeParse(request.body);
    return parsed.success ? parsed.data.challenge : null;
  }

  /** Slack resends unacknowledged events after 3s, numbering each retry */
  isRedelivery(request: WebhookRequest): boolean {
    return request.headers["x-slack-retry-num"] !== undefined;
  }

  parseInbound(raw: unknown): Message | null {
    const parsed = EventCallbackSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ParseError("Not a Slack event callback", this.platform);
    }

    const { event, authorizations } = parsed.data;
    // A mention also arrives as an app_mention event for the same ts
    if (event.type !== "message") return null;
    if (event.subtype || event.bot_id || !event.user || !event.text) return null;

    const botUserId = authorizations?.[0]?.user_id ?? this.slackConfig.bot_user_id;
    if (!botUserId) {
      throw new ParseError(
        "Slack event has no authorizations and no bot_user_id is configured",
        this.platform,
      );
    }

    return createMessage({
      messageId: asIdentifier(`${event.channel}:${event.ts}`),
      timestamp: Math.round(parseFloat(event.ts) * 1000),
      payload: { kind: "text", text: event.text },
      senderId: asIdentifier(event.user),
      recipientId: asIdentifier(`${botUserId}@${event.channel}`),
      conversationId: asIdentifier(
        event.thread_ts ? `${event.channel}:${event.thread_ts}` : event.channel,
      ),
      role: "user",
    });
  }

  buildRequest(thread: ThreadState): ModelRequest {
    return buildContextWindow(thread, {
      systemPrompt: this.slackConfig.system_prompt,
      maxContextMessages: this.slackConfig.max_context_messages,
    });
  }

  renderOutbound(message: Message): SlackOutbound {
    const [channel = "", threadTs] = message.conversationId.split(":");
    const texts = chunkText(payloadText(message.payload), SLACK_TEXT_LIMIT);
    return threadTs ? { channel, thread_ts: threadTs, texts } : { channel, texts };
  }

  async deliver(payload: SlackOutbound): Promise<void> {
    for (const text of payload.texts) {
      await this.post({ channel: payload.channel, text, thread_ts: payload.thread_ts });
    }
  }
}

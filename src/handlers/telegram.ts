import { Api } from "grammy";
import { z } from "zod";
import { ConfigurationError, ParseError } from "../errors";
import type { MessageHandler } from "../handler";
import type { ModelRequest } from "../llm/plugin";
import type { ThreadState } from "../store/chatStore";
import { type Message, asIdentifier, createMessage, payloadText } from "../types";
import { buildContextWindow, chunkText } from "./context";

const TELEGRAM_TEXT_LIMIT = 4096;

const UpdateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      message_id: z.number(),
      date: z.number(),
      chat: z.object({ id: z.number() }),
      from: z.object({ id: z.number(), is_bot: z.boolean() }).optional(),
      text: z.string().optional(),
      caption: z.string().optional(),
    })
    .optional(),
});

export interface TelegramOutbound {
  chatId: string;
  texts: string[];
}

interface TelegramConfig {
  bot_token: string;
  system_prompt?: string;
  max_context_messages?: number;
}

/** Bot API webhook updates in, sendMessage calls out */
export class TelegramHandler implements MessageHandler<TelegramOutbound> {
  readonly platform = "telegram";
  private readonly botId: string;
  private readonly send: (chatId: string, text: string) => Promise<unknown>;

  constructor(
    private telegramConfig: TelegramConfig,
    send?: (chatId: string, text: string) => Promise<unknown>,
  ) {
    // The bot's own user id is the numeric prefix of its token
    const match = /^(\d+):/.exec(telegramConfig.bot_token);
    if (!match?.[1]) {
      throw new ConfigurationError("Telegram bot_token must look like <bot id>:<secret>");
    }
    this.botId = match[1];
    if (send) {
      this.send = send;
    } else {
      const api = new Api(telegramConfig.bot_token);
      this.send = (chatId, text) => api.sendMessage(chatId, text);
    }
  }

  parseInbound(raw: unknown): Message | null {
    const parsed = UpdateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ParseError(
        `Not a Telegram update: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        this.platform,
      );
    }

    const msg = parsed.data.message;
    // Edits, callbacks, channel posts and other bots are not turns
    if (!msg?.from || msg.from.is_bot) return null;
    const text = msg.text ?? msg.caption;
    if (!text) return null;

    return createMessage({
      messageId: asIdentifier(`${msg.chat.id}:${msg.message_id}`),
      timestamp: msg.date * 1000,
      payload: { kind: "text", text },
      senderId: asIdentifier(msg.from.id),
      // Scoped to the chat so group history never mixes with private history
      recipientId: asIdentifier(`${this.botId}@${msg.chat.id}`),
      conversationId: asIdentifier(msg.chat.id),
      role: "user",
    });
  }

  buildRequest(thread: ThreadState): ModelRequest {
    return buildContextWindow(thread, {
      systemPrompt: this.telegramConfig.system_prompt,
      maxContextMessages: this.telegramConfig.max_context_messages,
    });
  }

  renderOutbound(message: Message): TelegramOutbound {
    return {
      chatId: message.conversationId,
      texts: chunkText(payloadText(message.payload), TELEGRAM_TEXT_LIMIT),
    };
  }

  async deliver(payload: TelegramOutbound): Promise<void> {
    for (const text of payload.texts) {
      await this.send(payload.chatId, text);
    }
  }
}

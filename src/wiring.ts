import type { Config, HandlerConfig, PluginConfig, StoreConfig } from "./config";
import type { MessageHandler } from "./handler";
import { MessengerHandler } from "./handlers/messenger";
import { SlackHandler } from "./handlers/slack";
import { TelegramHandler } from "./handlers/telegram";
import { AiSdkPlugin, anthropicModel, openAiCompatibleModel } from "./llm/aiSdk";
import type { LLMPlugin } from "./llm/plugin";
import { ServicesRunner } from "./runner";
import { Service } from "./service";
import type { ChatStore } from "./store/chatStore";
import { MemoryStore } from "./store/memoryStore";

export function createPlugin(config: PluginConfig): LLMPlugin {
  const model =
    config.type === "anthropic"
      ? anthropicModel({ model: config.model, apiKey: config.api_key, baseUrl: config.base_url })
      : openAiCompatibleModel({ model: config.model, apiKey: config.api_key, baseUrl: config.base_url });

  return new AiSdkPlugin({
    name: config.name,
    model,
    maxOutputTokens: config.max_output_tokens,
    temperature: config.temperature,
    maxRetries: config.max_retries,
    systemPrompt: config.system_prompt,
  });
}

export function createStore(config: StoreConfig): ChatStore {
  switch (config.type) {
    case "memory":
      return new MemoryStore({
        maxConversations: config.max_conversations,
        maxMessagesPerConversation: config.max_messages_per_conversation,
      });
  }
}

export function createHandler(config: HandlerConfig): MessageHandler {
  switch (config.type) {
    case "telegram":
      return new TelegramHandler(config);
    case "slack":
      return new SlackHandler(config);
    case "messenger":
      return new MessengerHandler(config);
  }
}

/**
 * Resolve every named plugin, store and handler once, then bind services to
 * them. Services naming the same store share one instance, and so one history.
 */
export function createServices(config: Config): Service<unknown>[] {
  const plugins = new Map(config.plugins.map((p) => [p.name, createPlugin(p)]));
  const stores = new Map(config.stores.map((s) => [s.name, createStore(s)]));
  const handlers = new Map(config.handlers.map((h) => [h.name, createHandler(h)]));

  return config.services.map((s) => {
    const plugin = plugins.get(s.plugin);
    const store = stores.get(s.store);
    const handler = handlers.get(s.handler);
    // parseConfig has already checked the references
    if (!plugin || !store || !handler) {
      throw new Error(`Unresolved reference in service ${s.webhook_path}`);
    }
    return new Service(store, handler, plugin, {
      route: s.webhook_path,
      timeoutMs: s.timeout_ms,
    });
  });
}

export function createServicesRunner(config: Config): ServicesRunner {
  return new ServicesRunner(createServices(config), config.port);
}

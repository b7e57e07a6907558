import { readFileSync } from "node:fs";
import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "./errors";

const named = { name: z.string().min(1) };
const systemPrompt = z.string().optional();
const maxContextMessages = z.number().int().positive().optional();

const AnthropicPluginSchema = z.object({
  ...named,
  type: z.literal("anthropic"),
  model: z.string().default("claude-sonnet-4-5-20250929"),
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
  max_output_tokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).optional(),
  max_retries: z.number().int().min(0).default(2),
  system_prompt: systemPrompt,
});

const OpenAiPluginSchema = z.object({
  ...named,
  type: z.literal("openai"),
  model: z.string(),
  api_key: z.string().optional(),
  base_url: z.string().url().default("https://api.openai.com/v1"),
  max_output_tokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).optional(),
  max_retries: z.number().int().min(0).default(2),
  system_prompt: systemPrompt,
});

const PluginSchema = z.discriminatedUnion("type", [
  AnthropicPluginSchema,
  OpenAiPluginSchema,
]);

const MemoryStoreSchema = z.object({
  ...named,
  type: z.literal("memory"),
  max_conversations: z.number().int().min(1),
  max_messages_per_conversation: z.number().int().min(1),
});

const StoreSchema = z.discriminatedUnion("type", [MemoryStoreSchema]);

const TelegramHandlerSchema = z.object({
  ...named,
  type: z.literal("telegram"),
  bot_token: z.string().regex(/^\d+:.+$/, "bot_token must look like <bot id>:<secret>"),
  system_prompt: systemPrompt,
  max_context_messages: maxContextMessages,
});

const SlackHandlerSchema = z.object({
  ...named,
  type: z.literal("slack"),
  bot_token: z.string(),
  bot_user_id: z.string().optional(),
  system_prompt: systemPrompt,
  max_context_messages: maxContextMessages,
});

const MessengerHandlerSchema = z.object({
  ...named,
  type: z.literal("messenger"),
  page_access_token: z.string(),
  verify_token: z.string(),
  api_version: z.string().regex(/^v\d+\.\d+$/).default("v21.0"),
  system_prompt: systemPrompt,
  max_context_messages: maxContextMessages,
});

const HandlerSchema = z.discriminatedUnion("type", [
  TelegramHandlerSchema,
  SlackHandlerSchema,
  MessengerHandlerSchema,
]);

const ServiceSchema = z.object({
  webhook_path: z.string().startsWith("/"),
  plugin: z.string(),
  store: z.string(),
  handler: z.string(),
  timeout_ms: z.number().int().positive().default(30_000),
});

function uniqueNames(items: { name: string }[]): boolean {
  return new Set(items.map((i) => i.name)).size === items.length;
}

const ConfigSchema = z
  .object({
    port: z.number().int().min(0).max(65535).default(8080),
    plugins: z
      .array(PluginSchema)
      .min(1, "At least one plugin must be defined")
      .refine(uniqueNames, "All plugin names must be unique"),
    stores: z
      .array(StoreSchema)
      .min(1, "At least one store must be defined")
      .refine(uniqueNames, "All store names must be unique"),
    handlers: z
      .array(HandlerSchema)
      .min(1, "At least one handler must be defined")
      .refine(uniqueNames, "All handler names must be unique"),
    services: z.array(ServiceSchema).min(1, "At least one service must be defined"),
  })
  .superRefine((cfg, ctx) => {
    const sections = {
      plugin: new Set(cfg.plugins.map((p) => p.name)),
      store: new Set(cfg.stores.map((s) => s.name)),
      handler: new Set(cfg.handlers.map((h) => h.name)),
    } as const;
    const paths = new Set<string>();

    cfg.services.forEach((service, i) => {
      for (const section of ["plugin", "store", "handler"] as const) {
        if (!sections[section].has(service[section])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["services", i, section],
            message: `${service[section]} must be the name of a ${section}`,
          });
        }
      }
      const path = service.webhook_path.replace(/\/+$/, "") || "/";
      if (paths.has(path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["services", i, "webhook_path"],
          message: `webhook_path ${path} is used by more than one service`,
        });
      }
      paths.add(path);
    });
  });

export type Config = z.infer<typeof ConfigSchema>;
export type PluginConfig = z.infer<typeof PluginSchema>;
export type StoreConfig = z.infer<typeof StoreSchema>;
export type HandlerConfig = z.infer<typeof HandlerSchema>;
export type ServiceConfig = z.infer<typeof ServiceSchema>;

/** Validate an already-parsed config object */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

export function loadConfig(path: string): Config {
  const raw = readFileSync(path, "utf-8");
  return parseConfig(parseYaml(raw));
}

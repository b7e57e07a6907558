import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import {
  APICallError,
  type CoreMessage,
  type LanguageModel,
  generateText,
} from "ai";
import { ModelError } from "../errors";
import type { LLMPlugin, ModelReply, ModelRequest } from "./plugin";

interface GenerateArgs {
  model: LanguageModel;
  system?: string;
  messages: CoreMessage[];
  maxTokens?: number;
  temperature?: number;
  maxRetries?: number;
  abortSignal?: AbortSignal;
}

/** The slice of `generateText` the plugin relies on; swapped out in tests */
export type GenerateTextFn = (args: GenerateArgs) => Promise<{
  text: string;
  usage: { promptTokens: number; completionTokens: number };
}>;

export interface AiSdkPluginOptions {
  name: string;
  model: LanguageModel;
  maxOutputTokens?: number;
  temperature?: number;
  maxRetries?: number;
  /** Prepended to the handler's system preamble */
  systemPrompt?: string;
  generate?: GenerateTextFn;
}

/**
 * LLMPlugin over the AI SDK. Any provider the SDK supports plugs in through
 * `model`; the factories below cover the configured plugin types.
 */
export class AiSdkPlugin implements LLMPlugin {
  readonly name: string;
  private readonly generate: GenerateTextFn;

  constructor(private readonly options: AiSdkPluginOptions) {
    this.name = options.name;
    this.generate = options.generate ?? ((args) => generateText(args));
  }

  async respond(
    request: ModelRequest,
    signal?: AbortSignal,
  ): Promise<ModelReply> {
    const system = [this.options.systemPrompt, request.system]
      .filter((s): s is string => Boolean(s))
      .join("\n\n");

    let result: Awaited<ReturnType<GenerateTextFn>>;
    try {
      result = await this.generate({
        model: this.options.model,
        system: system || undefined,
        messages: request.messages.map(toCoreMessage),
        maxTokens: this.options.maxOutputTokens,
        temperature: this.options.temperature,
        maxRetries: this.options.maxRetries,
        abortSignal: signal,
      });
    } catch (err) {
      throw classify(err, signal);
    }

    const text = result.text.trim();
    if (!text) {
      throw new ModelError("malformed", `${this.name} returned an empty reply`);
    }
    return {
      text,
      usage: {
        inputTokens: result.usage.promptTokens,
        outputTokens: result.usage.completionTokens,
      },
    };
  }
}

function toCoreMessage(m: ModelRequest["messages"][number]): CoreMessage {
  return m.role === "user"
    ? { role: "user", content: m.content }
    : { role: "assistant", content: m.content };
}

function classify(err: unknown, signal: AbortSignal | undefined): ModelError {
  if (signal?.aborted) {
    if (signal.reason instanceof ModelError) return signal.reason;
    return new ModelError("cancelled", "Model call aborted", { cause: err });
  }
  if (APICallError.isInstance(err)) {
    const status = err.statusCode ?? "no status";
    return new ModelError("rejected", `Backend rejected request (${status}): ${err.message}`, {
      cause: err,
    });
  }
  return ModelError.from(err);
}

export function anthropicModel(opts: {
  model: string;
  apiKey?: string;
  baseUrl?: string;
}): LanguageModel {
  const provider = createAnthropic({ apiKey: opts.apiKey, baseURL: opts.baseUrl });
  return provider(opts.model);
}

export function openAiCompatibleModel(opts: {
  model: string;
  apiKey?: string;
  baseUrl: string;
}): LanguageModel {
  const provider = createOpenAICompatible({
    name: "openai",
    baseURL: opts.baseUrl,
    apiKey: opts.apiKey,
  });
  return provider(opts.model);
}

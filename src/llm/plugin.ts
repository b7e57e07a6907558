/** One entry of the context window a model backend sees */
export interface ModelMessage {
  role: "user" | "assistant";
  content: string;
}

/** What a handler asks the model for: a system preamble plus history */
export interface ModelRequest {
  system?: string;
  messages: readonly ModelMessage[];
}

export interface ModelReply {
  text: string;
  usage?: { inputTokens: number; outputTokens: number };
}

/**
 * A model backend. Rejects with ModelError when no usable reply comes back.
 * Retrying against the backend is the plugin's own business; it never sees or
 * touches conversation storage.
 */
export interface LLMPlugin {
  readonly name: string;

  respond(request: ModelRequest, signal?: AbortSignal): Promise<ModelReply>;
}

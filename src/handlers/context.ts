import type { ModelMessage, ModelRequest } from "../llm/plugin";
import type { ThreadState } from "../store/chatStore";
import { payloadText } from "../types";

export interface ContextOptions {
  systemPrompt?: string;
  /** Keep only the newest N messages of the thread */
  maxContextMessages?: number;
}

/**
 * Shared context-window builder for every handler.
 *
 * System-role messages are folded into the preamble. The window is trimmed to
 * `maxContextMessages` and then to its first user turn, since chat backends
 * reject a conversation that opens with the assistant.
 */
export function buildContextWindow(
  thread: ThreadState,
  options: ContextOptions,
): ModelRequest {
  const system: string[] = options.systemPrompt ? [options.systemPrompt] : [];
  const turns: ModelMessage[] = [];

  for (const m of thread.messages) {
    const content = payloadText(m.payload);
    if (m.role === "system") {
      system.push(content);
    } else {
      turns.push({ role: m.role, content });
    }
  }

  let window =
    options.maxContextMessages !== undefined
      ? turns.slice(-options.maxContextMessages)
      : turns;
  const firstUser = window.findIndex((t) => t.role === "user");
  window = firstUser === -1 ? [] : window.slice(firstUser);

  return system.length
    ? { system: system.join("\n\n"), messages: window }
    : { messages: window };
}

/** Split text into chunks no longer than `max`, preferring newline then space boundaries */
export function chunkText(text: string, max: number): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > max) {
    let cut = rest.lastIndexOf("\n", max);
    if (cut <= 0) cut = rest.lastIndexOf(" ", max);
    if (cut <= 0) {
      cut = max;
      // don't split a surrogate pair
      const code = rest.charCodeAt(cut - 1);
      if (code >= 0xd800 && code <= 0xdbff) cut--;
    }
    chunks.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).trimStart();
  }
  if (rest) chunks.push(rest);
  return chunks;
}

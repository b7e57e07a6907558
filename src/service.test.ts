import { describe, expect, it, vi } from "vitest";
import { ModelError, ParseError, StoreError } from "./errors";
import type { MessageHandler } from "./handler";
import { buildContextWindow } from "./handlers/context";
import type { LLMPlugin, ModelReply, ModelRequest } from "./llm/plugin";
import { Service } from "./service";
import { type ChatStore, type ThreadState, conversationKey } from "./store/chatStore";
import { MemoryStore } from "./store/memoryStore";
import { type Message, asIdentifier, createMessage, payloadText } from "./types";

interface FakeInbound {
  from: string;
  text: string;
}

/** Test platform: `{ from, text }` in, `{ to, text }` out */
class FakeHandler implements MessageHandler<{ to: string; text: string }> {
  readonly platform = "fake";
  delivered: { to: string; text: string }[] = [];
  failDelivery = false;

  split(raw: unknown): unknown[] {
    return Array.isArray(raw) ? raw : [raw];
  }

  parseInbound(raw: unknown): Message | null {
    if (!isFakeInbound(raw)) throw new ParseError("bad fake payload", this.platform);
    if (raw.text === "") return null;
    return createMessage({
      timestamp: 1_000,
      payload: { kind: "text", text: raw.text },
      senderId: asIdentifier(raw.from),
      recipientId: asIdentifier("bot"),
      conversationId: asIdentifier(raw.from),
      role: "user",
    });
  }

  buildRequest(thread: ThreadState): ModelRequest {
    return buildContextWindow(thread, {});
  }

  renderOutbound(message: Message) {
    return { to: message.recipientId, text: payloadText(message.payload) };
  }

  async deliver(payload: { to: string; text: string }): Promise<void> {
    if (this.failDelivery) throw new Error("platform down");
    this.delivered.push(payload);
  }
}

function isFakeInbound(raw: unknown): raw is FakeInbound {
  return (
    typeof raw === "object" &&
    raw !== null &&
    "from" in raw &&
    "text" in raw &&
    typeof raw.from === "string" &&
    typeof raw.text === "string"
  );
}

const echoPlugin = (): LLMPlugin => ({
  name: "echo",
  respond: async (request) => {
    const last = request.messages[request.messages.length - 1];
    return { text: `echo: ${last?.content ?? ""}` };
  },
});

const failingPlugin = (err: unknown): LLMPlugin => ({
  name: "failing",
  respond: async () => {
    throw err;
  },
});

const threadOf = async (store: ChatStore, user: string) =>
  store.get(conversationKey(asIdentifier(user), asIdentifier("bot")));

const texts = (thread: ThreadState | undefined) =>
  thread?.messages.map((m) => `${m.role}:${payloadText(m.payload)}`);

const newStore = () => new MemoryStore({ maxConversations: 10, maxMessagesPerConversation: 20 });

describe("Service.handleInbound", () => {
  it("records both sides of a turn and renders the reply", async () => {
    const store = newStore();
    const service = new Service(store, new FakeHandler(), echoPlugin(), {
      route: "/fake",
      now: () => 5_000,
    });

    const result = await service.handleInbound({ from: "alice", text: "hi" });

    expect(result).toEqual({ ok: true, value: { to: "alice", text: "echo: hi" } });
    const thread = await threadOf(store, "alice");
    expect(texts(thread)).toEqual(["user:hi", "assistant:echo: hi"]);
    const reply = thread?.newest;
    expect(reply?.senderId).toBe("bot");
    expect(reply?.recipientId).toBe("alice");
    expect(reply?.conversationId).toBe("alice");
    expect(reply?.timestamp).toBe(5_000);
  });

  it("logs the token usage a plugin reports", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const plugin: LLMPlugin = {
      name: "metered",
      respond: async () => ({ text: "ok", usage: { inputTokens: 12, outputTokens: 3 } }),
    };
    const service = new Service(newStore(), new FakeHandler(), plugin, { route: "/fake" });

    await service.handleInbound({ from: "alice", text: "hi" });

    expect(log).toHaveBeenCalledWith("[service /fake] metered replied to alice (12 in / 3 out tokens)");
    log.mockRestore();
  });

  it("rejects a malformed payload without touching the store", async () => {
    const store = newStore();
    const service = new Service(store, new FakeHandler(), echoPlugin(), { route: "/fake" });

    const result = await service.handleInbound({ nope: true });

    expect(result).toEqual({
      ok: false,
      error: { code: "INVALID_PAYLOAD", message: "bad fake payload", context: { platform: "fake" } },
    });
    expect(await store.size()).toBe(0);
  });

  it("skips events that are not turns", async () => {
    const store = newStore();
    const respond = vi.fn(async (): Promise<ModelReply> => ({ text: "x" }));
    const service = new Service(store, new FakeHandler(), { name: "spy", respond }, {
      route: "/fake",
    });

    expect(await service.handleInbound({ from: "alice", text: "" })).toEqual({ ok: true, value: null });
    expect(respond).not.toHaveBeenCalled();
    expect(await store.size()).toBe(0);
  });

  it("keeps the inbound message but no reply when the model fails on the first turn", async () => {
    const store = newStore();
    const service = new Service(
      store,
      new FakeHandler(),
      failingPlugin(new ModelError("rejected", "backend said no")),
      { route: "/fake" },
    );

    const result = await service.handleInbound({ from: "alice", text: "hi" });

    expect(result).toEqual({
      ok: false,
      error: { code: "MODEL_UNAVAILABLE", message: "backend said no", context: { kind: "rejected" } },
    });
    expect(texts(await threadOf(store, "alice"))).toEqual(["user:hi"]);
  });

  it("keeps earlier turns intact when a later model call fails", async () => {
    const store = newStore();
    const handler = new FakeHandler();
    await new Service(store, handler, echoPlugin(), { route: "/fake" }).handleInbound({
      from: "alice",
      text: "one",
    });

    const broken = new Service(store, handler, failingPlugin(new Error("socket hang up")), {
      route: "/fake",
    });
    const result = await broken.handleInbound({ from: "alice", text: "two" });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.context).toEqual({ kind: "rejected" });
    expect(texts(await threadOf(store, "alice"))).toEqual([
      "user:one",
      "assistant:echo: one",
      "user:two",
    ]);
  });

  it("treats a missed deadline as a timeout and stores no reply", async () => {
    const store = newStore();
    const slow: LLMPlugin = {
      name: "slow",
      respond: () => new Promise<ModelReply>(() => {}),
    };
    const service = new Service(store, new FakeHandler(), slow, {
      route: "/fake",
      timeoutMs: 20,
    });

    const result = await service.handleInbound({ from: "alice", text: "hi" });

    expect(result).toEqual({
      ok: false,
      error: {
        code: "MODEL_UNAVAILABLE",
        message: "No reply within 20ms",
        context: { kind: "timeout" },
      },
    });
    expect(texts(await threadOf(store, "alice"))).toEqual(["user:hi"]);
  });

  it("passes the abort signal to the plugin", async () => {
    const respond = vi.fn(
      async (_request: ModelRequest, _signal?: AbortSignal): Promise<ModelReply> => ({ text: "ok" }),
    );
    const service = new Service(newStore(), new FakeHandler(), { name: "spy", respond }, {
      route: "/fake",
    });
    await service.handleInbound({ from: "alice", text: "hi" });
    const signal = respond.mock.calls[0]?.[1];
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(signal?.aborted).toBe(false);
  });

  it("does not roll back the inbound message when the caller cancels", async () => {
    const store = newStore();
    const controller = new AbortController();
    const plugin: LLMPlugin = {
      name: "hanging",
      respond: () => {
        controller.abort();
        return new Promise<ModelReply>(() => {});
      },
    };
    const service = new Service(store, new FakeHandler(), plugin, { route: "/fake" });

    const result = await service.handleInbound(
      { from: "alice", text: "hi" },
      { signal: controller.signal },
    );

    expect(result).toEqual({
      ok: false,
      error: { code: "CANCELLED", message: "Turn cancelled before a reply was produced" },
    });
    expect(texts(await threadOf(store, "alice"))).toEqual(["user:hi"]);
  });

  it("maps store I/O failures to STORE_UNAVAILABLE", async () => {
    const broken: ChatStore = {
      add: async () => {
        throw new StoreError("disk full");
      },
      get: async () => undefined,
      size: async () => 0,
    };
    const service = new Service(broken, new FakeHandler(), echoPlugin(), { route: "/fake" });
    expect(await service.handleInbound({ from: "alice", text: "hi" })).toEqual({
      ok: false,
      error: { code: "STORE_UNAVAILABLE", message: "disk full" },
    });
  });

  it("writes concurrent turns for one conversation in arrival order", async () => {
    const store = newStore();
    const releases: (() => void)[] = [];
    const plugin: LLMPlugin = {
      name: "gated",
      respond: (request) =>
        new Promise<ModelReply>((resolve) => {
          const last = request.messages[request.messages.length - 1];
          releases.push(() => resolve({ text: `re ${last?.content ?? ""}` }));
        }),
    };
    const service = new Service(store, new FakeHandler(), plugin, { route: "/fake" });

    const first = service.handleInbound({ from: "alice", text: "a" });
    const second = service.handleInbound({ from: "alice", text: "b" });
    await vi.waitFor(() => expect(releases).toHaveLength(2));

    // Second model call finishes first
    releases[1]?.();
    await second;
    releases[0]?.();
    await first;

    expect(texts(await threadOf(store, "alice"))).toEqual([
      "user:a",
      "user:b",
      "assistant:re b",
      "assistant:re a",
    ]);
  });
});

describe("Service.process", () => {
  it("runs every event of a delivery in order and delivers the replies", async () => {
    const handler = new FakeHandler();
    const service = new Service(newStore(), handler, echoPlugin(), { route: "/fake" });

    const report = await service.process([
      { from: "alice", text: "one" },
      { bogus: 1 },
      { from: "bob", text: "" },
      { from: "bob", text: "two" },
    ]);

    expect(report).toEqual({
      replied: 2,
      undelivered: 0,
      failures: [
        { code: "INVALID_PAYLOAD", message: "bad fake payload", context: { platform: "fake" } },
      ],
    });
    expect(handler.delivered).toEqual([
      { to: "alice", text: "echo: one" },
      { to: "bob", text: "echo: two" },
    ]);
  });

  it("counts a failed delivery without failing the turn", async () => {
    const handler = new FakeHandler();
    handler.failDelivery = true;
    const store = newStore();
    const service = new Service(store, handler, echoPlugin(), { route: "/fake" });
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});

    const report = await service.process({ from: "alice", text: "hi" });

    expect(report).toEqual({ replied: 1, undelivered: 1, failures: [] });
    expect(texts(await threadOf(store, "alice"))).toEqual(["user:hi", "assistant:echo: hi"]);
    errorLog.mockRestore();
  });
});

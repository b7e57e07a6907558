import {
  ModelError,
  ParseError,
  type PipelineError,
  type PipelineResult,
  StoreError,
  fail,
  ok,
} from "./errors";
import type { MessageHandler, WebhookRequest } from "./handler";
import type { LLMPlugin, ModelReply, ModelRequest } from "./llm/plugin";
import type { ChatStore, ThreadState } from "./store/chatStore";
import { type Message, createReply } from "./types";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ServiceOptions {
  route: string;
  /** Deadline for one model call */
  timeoutMs?: number;
  now?: () => number;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

/** What became of one webhook delivery */
export interface TurnReport {
  /** Events that produced a reply */
  replied: number;
  /** Replies that were stored but could not be sent */
  undelivered: number;
  failures: PipelineError[];
}

/** The route-facing side of a Service, with the outbound type erased */
export interface WebhookService {
  readonly route: string;
  readonly platform: string;
  handshake(request: WebhookRequest): string | null;
  isRedelivery(request: WebhookRequest): boolean;
  process(body: unknown, options?: TurnOptions): Promise<TurnReport>;
}

/**
 * One configured pipeline: store, handler and plugin behind one webhook route.
 *
 * A turn records the inbound message, asks the model, records the reply and
 * renders it. A failed or abandoned model call leaves the inbound message in
 * history and adds nothing else. The Service takes no locks of its own; store
 * writes for a conversation land in the order the store completes them.
 */
export class Service<TOutbound> implements WebhookService {
  readonly route: string;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(
    readonly store: ChatStore,
    readonly handler: MessageHandler<TOutbound>,
    readonly plugin: LLMPlugin,
    options: ServiceOptions,
  ) {
    this.route = options.route;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  get platform(): string {
    return this.handler.platform;
  }

  handshake(request: WebhookRequest): string | null {
    return this.handler.handshake?.(request) ?? null;
  }

  isRedelivery(request: WebhookRequest): boolean {
    return this.handler.isRedelivery?.(request) ?? false;
  }

  async handleInbound(
    raw: unknown,
    options: TurnOptions = {},
  ): Promise<PipelineResult<TOutbound | null>> {
    // Step 1: parse
    let inbound: Message | null;
    try {
      inbound = this.handler.parseInbound(raw);
    } catch (err) {
      if (err instanceof ParseError) {
        return fail("INVALID_PAYLOAD", err.message, { platform: err.platform });
      }
      throw err;
    }
    if (!inbound) return ok(null);

    // Step 2: record the user's message. From here on it is never rolled back.
    let thread: ThreadState;
    try {
      thread = await this.store.add(inbound);
    } catch (err) {
      return storeFailure(err);
    }

    // Steps 3-4: ask the model
    const request = this.handler.buildRequest(thread);
    let reply: ModelReply;
    try {
      reply = await this.callModel(request, options.signal);
    } catch (err) {
      const modelErr = ModelError.from(err);
      console.warn(
        `[service ${this.route}] ${this.plugin.name} ${modelErr.kind}: ${modelErr.message}`,
      );
      return modelErr.kind === "cancelled"
        ? fail("CANCELLED", "Turn cancelled before a reply was produced")
        : fail("MODEL_UNAVAILABLE", modelErr.message, { kind: modelErr.kind });
    }
    if (reply.usage) {
      console.log(
        `[service ${this.route}] ${this.plugin.name} replied to ${thread.userId} ` +
          `(${reply.usage.inputTokens} in / ${reply.usage.outputTokens} out tokens)`,
      );
    }

    // Step 5: record the reply
    const assistant = createReply(inbound, reply.text, this.now());
    try {
      await this.store.add(assistant);
    } catch (err) {
      return storeFailure(err);
    }

    // Step 6: render for the platform
    return ok(this.handler.renderOutbound(assistant));
  }

  async process(body: unknown, options: TurnOptions = {}): Promise<TurnReport> {
    const events = this.handler.split?.(body) ?? [body];
    const report: TurnReport = { replied: 0, undelivered: 0, failures: [] };

    for (const event of events) {
      const result = await this.handleInbound(event, options);
      if (!result.ok) {
        report.failures.push(result.error);
        continue;
      }
      if (result.value === null) continue;

      report.replied++;
      try {
        await this.handler.deliver(result.value);
      } catch (err) {
        report.undelivered++;
        console.error(`[service ${this.route}] Failed to deliver reply:`, err);
      }
    }
    return report;
  }

  /**
   * Run the plugin under the service deadline and the caller's signal.
   * Whichever fires first aborts the call; the plugin is not trusted to honor
   * the signal, so the abort also settles the race on its own.
   */
  private async callModel(
    request: ModelRequest,
    callerSignal?: AbortSignal,
  ): Promise<ModelReply> {
    const controller = new AbortController();
    const { signal } = controller;

    const timer = setTimeout(() => {
      controller.abort(
        new ModelError("timeout", `No reply within ${this.timeoutMs}ms`),
      );
    }, this.timeoutMs);
    const onCallerAbort = () => {
      controller.abort(new ModelError("cancelled", "Caller aborted the turn"));
    };
    if (callerSignal?.aborted) onCallerAbort();
    else callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    let removeAbortListener = () => {};
    try {
      if (signal.aborted) throw signal.reason;
      const aborted = new Promise<never>((_, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });
        removeAbortListener = () => signal.removeEventListener("abort", onAbort);
      });
      return await Promise.race([this.plugin.respond(request, signal), aborted]);
    } finally {
      clearTimeout(timer);
      removeAbortListener();
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }
}

function storeFailure(err: unknown): PipelineResult<never> {
  if (err instanceof StoreError) {
    return fail("STORE_UNAVAILABLE", err.message);
  }
  throw err;
}

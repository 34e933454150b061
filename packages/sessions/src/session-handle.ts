/**
 * Session Handle
 *
 * The unit of isolation: one conversation's engine session, its callback
 * slots and its token counters. The engine's stream hook is bound to this
 * handle's `dispatch` when the session is created and never rewired, so an
 * event can only ever reach the handle whose session emitted it.
 */

import { Logger } from "@switchboard/kernel";
import {
  ConfigurationError,
  EngineEvents,
  MalformedEventError,
  blockDeltaPayloadSchema,
  blockEndPayloadSchema,
  blockStartPayloadSchema,
  llmResponsePayloadSchema,
  toolPostPayloadSchema,
  toolPrePayloadSchema,
  type ToolInput,
} from "@switchboard/shared";
import type { z } from "zod";
import type {
  EngineSession,
  EngineSessionConfig,
  ExecutionEngine,
  ProviderModelInfo,
} from "./engine.js";

const log = Logger.for("SessionHandle");

/**
 * Callback slots a handle forwards dispatched events to. A missing slot is
 * a no-op.
 */
export interface StreamCallbacks {
  onContentBlockStart?: (blockType: string, blockIndex: number) => void;
  onContentBlockDelta?: (blockType: string, delta: string) => void;
  onContentBlockEnd?: (blockType: string, text: string) => void;
  onToolPre?: (name: string, toolInput: ToolInput) => void;
  onToolPost?: (name: string, toolInput: ToolInput, result: string) => void;
  onExecutionStart?: () => void;
  onExecutionEnd?: () => void;
  onUsageUpdate?: () => void;
}

export interface SessionHandleOptions {
  workingDir: string;
  /** Model to switch the new session to */
  model?: string;
  /** Characters of a tool result kept when forwarding */
  toolResultLimit?: number;
}

const DEFAULT_TOOL_RESULT_LIMIT = 2000;
const THINKING_BLOCK_TYPES = new Set(["thinking", "reasoning"]);

export class SessionHandle {
  readonly conversationId: string;

  private engineSession: EngineSession | null = null;
  private callbacks: StreamCallbacks = {};
  private readonly toolResultLimit: number;

  private inputTokens = 0;
  private outputTokens = 0;
  private model = "";
  private contextWindowSize = 0;

  private constructor(conversationId: string, toolResultLimit: number) {
    this.conversationId = conversationId;
    this.toolResultLimit = toolResultLimit;
  }

  /**
   * Ask the engine for a new session bound to a fresh handle.
   */
  static async create(
    conversationId: string,
    engine: ExecutionEngine,
    options: SessionHandleOptions,
  ): Promise<SessionHandle> {
    const handle = new SessionHandle(
      conversationId,
      options.toolResultLimit ?? DEFAULT_TOOL_RESULT_LIMIT,
    );
    const session = await engine.createSession(handle.engineConfig(options));
    handle.attach(session, options.model);
    return handle;
  }

  /**
   * Reattach to an engine session that already exists (e.g. from a previous run).
   */
  static async resume(
    engineSessionId: string,
    conversationId: string,
    engine: ExecutionEngine,
    options: SessionHandleOptions,
  ): Promise<SessionHandle> {
    if (!engine.resumeSession) {
      throw ConfigurationError.unsupported("session resume");
    }
    const handle = new SessionHandle(
      conversationId,
      options.toolResultLimit ?? DEFAULT_TOOL_RESULT_LIMIT,
    );
    const session = await engine.resumeSession(engineSessionId, handle.engineConfig(options));
    handle.attach(session, options.model);
    return handle;
  }

  private engineConfig(options: SessionHandleOptions): EngineSessionConfig {
    return { workingDir: options.workingDir, model: options.model, onStream: this.dispatch };
  }

  private attach(session: EngineSession, model?: string): void {
    this.engineSession = session;
    if (model) {
      this.switchModel(model);
    }
    this.resetUsage();
    this.refreshModelInfo();
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /** The engine session, or null once the handle is closed */
  get session(): EngineSession | null {
    return this.engineSession;
  }

  get sessionId(): string | null {
    return this.engineSession?.id ?? null;
  }

  get isOpen(): boolean {
    return this.engineSession !== null;
  }

  get totalInputTokens(): number {
    return this.inputTokens;
  }

  get totalOutputTokens(): number {
    return this.outputTokens;
  }

  get modelName(): string {
    return this.model;
  }

  get contextWindow(): number {
    return this.contextWindowSize;
  }

  // ==========================================================================
  // Callbacks
  // ==========================================================================

  /**
   * Replace every callback slot. Slots missing from `callbacks` become no-ops.
   */
  installCallbacks(callbacks: StreamCallbacks): void {
    this.callbacks = { ...callbacks };
  }

  clearCallbacks(): void {
    this.callbacks = {};
  }

  /**
   * Route one engine event to this handle's callbacks.
   *
   * Never throws: unknown events and payloads that fail validation are
   * logged and dropped, and a throwing callback is logged.
   */
  readonly dispatch = (event: string, payload: unknown): void => {
    try {
      this.route(event, payload ?? {});
    } catch (error) {
      log.warn(
        { conversationId: this.conversationId, event, err: error },
        "stream callback threw; event dropped",
      );
    }
  };

  private route(event: string, payload: unknown): void {
    const cb = this.callbacks;

    switch (event) {
      case EngineEvents.CONTENT_BLOCK_START: {
        const data = this.parse(event, blockStartPayloadSchema, payload);
        if (!data) return;
        cb.onContentBlockStart?.(data.block_type || "text", data.block_index ?? 0);
        return;
      }

      case EngineEvents.CONTENT_BLOCK_DELTA: {
        const data = this.parse(event, blockDeltaPayloadSchema, payload);
        if (!data) return;
        const delta = data.delta || data.text || data.content || "";
        if (delta) {
          cb.onContentBlockDelta?.(data.block_type || "text", delta);
        }
        return;
      }

      case EngineEvents.CONTENT_BLOCK_END: {
        const data = this.parse(event, blockEndPayloadSchema, payload);
        if (!data) return;
        const block = data.block;
        if (block?.type === "text") {
          cb.onContentBlockEnd?.("text", block.text ?? "");
        } else if (block?.type && THINKING_BLOCK_TYPES.has(block.type)) {
          cb.onContentBlockEnd?.("thinking", block.thinking || block.text || "");
        }
        return;
      }

      case EngineEvents.TOOL_PRE: {
        const data = this.parse(event, toolPrePayloadSchema, payload);
        if (!data) return;
        cb.onToolPre?.(data.tool_name ?? "unknown", toToolInput(data.tool_input));
        return;
      }

      case EngineEvents.TOOL_POST: {
        const data = this.parse(event, toolPostPayloadSchema, payload);
        if (!data) return;
        cb.onToolPost?.(
          data.tool_name ?? "unknown",
          toToolInput(data.tool_input),
          this.formatToolResult(data.result),
        );
        return;
      }

      case EngineEvents.EXECUTION_START:
        cb.onExecutionStart?.();
        return;

      case EngineEvents.EXECUTION_END:
        cb.onExecutionEnd?.();
        return;

      case EngineEvents.LLM_RESPONSE: {
        const data = this.parse(event, llmResponsePayloadSchema, payload);
        if (!data) return;
        if (data.usage) {
          this.inputTokens += data.usage.input ?? 0;
          this.outputTokens += data.usage.output ?? 0;
        }
        if (data.model && !this.model) {
          this.model = data.model;
        }
        cb.onUsageUpdate?.();
        return;
      }

      default:
        log.debug({ conversationId: this.conversationId, event }, "ignoring unknown stream event");
    }
  }

  private parse<T extends z.ZodTypeAny>(
    event: string,
    schema: T,
    payload: unknown,
  ): z.infer<T> | undefined {
    const result = schema.safeParse(payload);
    if (result.success) {
      return result.data;
    }
    const malformed = new MalformedEventError(event, result.error.issues[0]?.message ?? "invalid", {
      conversationId: this.conversationId,
    });
    log.debug({ code: malformed.code, details: malformed.details }, malformed.message);
    return undefined;
  }

  private formatToolResult(result: unknown): string {
    let text: string;
    if (result === undefined || result === null) {
      text = "";
    } else if (typeof result === "object") {
      text = JSON.stringify(result, null, 2);
    } else {
      text = String(result);
    }
    return truncateCodePoints(text, this.toolResultLimit);
  }

  // ==========================================================================
  // Usage & model
  // ==========================================================================

  /**
   * Zero the token counters and forget the model name. Called when a turn
   * starts, never mid-turn; follow with `refreshModelInfo()` to read the
   * model back from the session.
   */
  resetUsage(): void {
    this.inputTokens = 0;
    this.outputTokens = 0;
    this.model = "";
    this.contextWindowSize = 0;
  }

  /**
   * Read model name and context window from the session's first provider.
   */
  refreshModelInfo(): void {
    const provider = this.providers()[0];
    if (!provider) return;
    if (provider.model) {
      this.model = provider.model;
    }
    if (provider.contextWindow !== undefined) {
      this.contextWindowSize = provider.contextWindow;
    }
  }

  /**
   * Switch the session's active model.
   */
  switchModel(model: string): boolean {
    const session = this.engineSession;
    if (!session?.setModel) return false;
    try {
      if (!session.setModel(model)) return false;
    } catch (error) {
      log.debug({ conversationId: this.conversationId, model, err: error }, "model switch failed");
      return false;
    }
    this.model = model;
    return true;
  }

  /**
   * `[model, provider]` pairs for every provider with a configured model.
   */
  providerModels(): Array<[model: string, provider: string]> {
    const pairs: Array<[string, string]> = [];
    for (const provider of this.providers()) {
      if (provider.model) {
        pairs.push([provider.model, provider.provider]);
      }
    }
    return pairs;
  }

  private providers(): ProviderModelInfo[] {
    const session = this.engineSession;
    if (!session?.providers) return [];
    try {
      return session.providers();
    } catch (error) {
      log.debug({ conversationId: this.conversationId, err: error }, "failed to read provider info");
      return [];
    }
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  /**
   * End the engine-side session. Safe to call more than once; only the
   * first call reaches the engine. Engine errors are logged, not thrown.
   */
  async close(engine: ExecutionEngine): Promise<void> {
    const session = this.engineSession;
    if (!session) return;
    this.engineSession = null;
    this.callbacks = {};

    try {
      await engine.endSession(session);
    } catch (error) {
      log.debug({ conversationId: this.conversationId, err: error }, "engine session teardown failed");
    }
  }

  /**
   * Forget the engine session without ending it.
   */
  detach(): void {
    this.engineSession = null;
    this.callbacks = {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects pass through; any other present value is wrapped as `{ input }`. */
function toToolInput(raw: unknown): ToolInput {
  if (raw === undefined || raw === null) return {};
  return isRecord(raw) ? raw : { input: raw };
}

/** First `limit` code points, never splitting a surrogate pair. */
function truncateCodePoints(text: string, limit: number): string {
  if (text.length <= limit) return text;
  let out = "";
  let count = 0;
  for (const char of text) {
    if (count === limit) break;
    out += char;
    count++;
  }
  return out;
}

/**
 * Session Engine Testing Utilities
 *
 * An in-process execution engine and a recording display, for exercising
 * the session engine without a real agent behind it.
 *
 * @example
 * ```typescript
 * import { createMockEngine, createRecordingDisplay } from "@switchboard/sessions/testing";
 *
 * const engine = createMockEngine({ streamDeltas: ["Hel", "lo"] });
 * const display = createRecordingDisplay();
 * const controller = new ConversationController({ engine, display });
 *
 * controller.open({ conversationId: "t1" });
 * controller.send("t1", "hi");
 * await controller.idle("t1");
 *
 * expect(display.streamText("t1")).toBe("Hello");
 * ```
 *
 * @module @switchboard/sessions/testing
 */

import { EngineEvents, type StreamHook, type ToolInput } from "@switchboard/shared";
import type {
  EngineSession,
  EngineSessionConfig,
  ExecutionEngine,
  ProviderModelInfo,
} from "./engine.js";
import type { ConversationDisplay } from "./display.js";
import type { SessionRegistry } from "./session-registry.js";

// ============================================================================
// Turn Control
// ============================================================================

/**
 * A promise settled from outside. Backs held session creations and manual
 * turns.
 */
export interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

export function createDeferred<T = void>(): Deferred<T> {
  const settle: { resolve?: (value: T) => void; reject?: (error: Error) => void } = {};
  const promise = new Promise<T>((resolve, reject) => {
    settle.resolve = resolve;
    settle.reject = reject;
  });
  return {
    promise,
    resolve: (value) => settle.resolve?.(value),
    reject: (error) => settle.reject?.(error),
  };
}

/**
 * Yield to the event loop until `condition` holds. Workers advance on
 * promise continuations, so each check runs after pending ones have had a
 * chance to settle.
 */
export async function waitUntil(
  condition: () => boolean,
  options: { timeoutMs?: number; label?: string } = {},
): Promise<void> {
  const { timeoutMs = 2000, label = "condition" } = options;
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() >= deadline) {
      throw new Error(`Timed out after ${timeoutMs}ms waiting for ${label}`);
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Resolve once the conversation's engine session has received at least
 * `count` turns.
 */
export function waitForTurns(
  engine: MockEngine,
  registry: SessionRegistry,
  conversationId: string,
  count: number,
): Promise<void> {
  return waitUntil(
    () => {
      const sessionId = registry.getHandle(conversationId)?.sessionId;
      const session = engine.sessions.find((s) => s.id === sessionId);
      return session !== undefined && session.turns.length >= count;
    },
    { label: `turn ${count} of "${conversationId}"` },
  );
}

// ============================================================================
// Mock Engine
// ============================================================================

export type ScriptedEvent = [event: string, payload?: unknown];

export interface MockToolCall {
  name: string;
  input: ToolInput;
  result: unknown;
}

export interface MockEngineOptions {
  /** Final response text returned by execute */
  response?: string;
  /** Stream this text as one text block, one delta per entry */
  streamDeltas?: string[];
  /** Tool calls emitted before the streamed text */
  toolCalls?: MockToolCall[];
  /** Token usage reported after the turn */
  usage?: { input: number; output: number };
  /** Model name reported with usage */
  model?: string;
  /** Error thrown by execute */
  error?: Error;
  /** Delay before execute starts emitting (ms) */
  delay?: number;
  /**
   * Leave every turn open until the test calls `finish()` or `fail()` on the
   * session. Events are then emitted only through `emit()`.
   */
  manual?: boolean;
  /** Error thrown by createSession */
  createError?: Error;
  /** Provider info exposed by every session */
  providers?: ProviderModelInfo[];
  /** Omit resumeSession from the engine */
  resumable?: boolean;
}

export interface MockTurn {
  message: string;
  finish(response?: string): void;
  fail(error: Error): void;
  readonly settled: boolean;
}

export interface MockEngineSession extends EngineSession {
  readonly config: EngineSessionConfig;
  readonly messages: string[];
  readonly turns: MockTurn[];
  readonly ended: boolean;
  /** Push one event through the session's stream hook */
  emit(event: string, payload?: unknown): void;
  /** The turn currently waiting in manual mode */
  currentTurn(): MockTurn | undefined;
  /** Finish the current manual turn */
  finish(response?: string): void;
  /** Fail the current manual turn */
  fail(error: Error): void;
}

export interface MockEngine extends ExecutionEngine {
  readonly sessions: MockEngineSession[];
  readonly endedSessionIds: string[];
  readonly createCount: number;
  /** Look up a session by id; throws when unknown */
  sessionById(id: string): MockEngineSession;
  /** Hold the next session creation until the returned deferred resolves */
  holdCreation(): Deferred<void>;
}

/**
 * Build the event sequence a scripted (non-manual) turn emits.
 */
export function scriptTurn(options: MockEngineOptions): ScriptedEvent[] {
  const events: ScriptedEvent[] = [[EngineEvents.EXECUTION_START, {}]];

  for (const call of options.toolCalls ?? []) {
    events.push([EngineEvents.TOOL_PRE, { tool_name: call.name, tool_input: call.input }]);
    events.push([
      EngineEvents.TOOL_POST,
      { tool_name: call.name, tool_input: call.input, result: call.result },
    ]);
  }

  if (options.streamDeltas && options.streamDeltas.length > 0) {
    events.push([EngineEvents.CONTENT_BLOCK_START, { block_type: "text", block_index: 0 }]);
    for (const delta of options.streamDeltas) {
      events.push([EngineEvents.CONTENT_BLOCK_DELTA, { block_type: "text", delta }]);
    }
    events.push([
      EngineEvents.CONTENT_BLOCK_END,
      { block_index: 0, block: { type: "text", text: options.streamDeltas.join("") } },
    ]);
  }

  if (options.usage || options.model) {
    events.push([EngineEvents.LLM_RESPONSE, { usage: options.usage, model: options.model }]);
  }

  events.push([EngineEvents.EXECUTION_END, {}]);
  return events;
}

/**
 * Create an in-process execution engine.
 */
export function createMockEngine(options: MockEngineOptions = {}): MockEngine {
  const sessions: MockEngineSession[] = [];
  const endedSessionIds: string[] = [];
  const enders = new Map<string, () => void>();
  let createCount = 0;
  let creationGate: Promise<void> | null = null;

  const openSession = async (id: string, config: EngineSessionConfig): Promise<MockEngineSession> => {
    createCount++;
    const gate = creationGate;
    creationGate = null;
    if (gate) {
      await gate;
    }
    if (options.createError) {
      throw options.createError;
    }
    const { session, end } = createMockSession(id, config, options);
    sessions.push(session);
    enders.set(id, end);
    return session;
  };

  const engine: MockEngine = {
    sessions,
    endedSessionIds,
    get createCount() {
      return createCount;
    },

    createSession: (config) => openSession(`mock-session-${createCount + 1}`, config),

    endSession: async (session) => {
      endedSessionIds.push(session.id);
      enders.get(session.id)?.();
    },

    sessionById(id) {
      const session = sessions.find((s) => s.id === id);
      if (!session) {
        throw new Error(`No mock session "${id}"`);
      }
      return session;
    },

    holdCreation() {
      const gate = createDeferred<void>();
      creationGate = gate.promise;
      return gate;
    },
  };

  if (options.resumable !== false) {
    engine.resumeSession = (sessionId, config) => openSession(sessionId, config);
  }

  return engine;
}

function createMockSession(
  id: string,
  config: EngineSessionConfig,
  options: MockEngineOptions,
): { session: MockEngineSession; end: () => void } {
  const hook: StreamHook = config.onStream;
  const messages: string[] = [];
  const turns: MockTurn[] = [];
  const flag = { ended: false };
  let model = options.providers?.[0]?.model;

  const currentTurn = (): MockTurn | undefined => turns.find((turn) => !turn.settled);

  const openTurn = (message: string): Promise<string> => {
    const deferred = createDeferred<string>();
    let settled = false;
    turns.push({
      message,
      finish: (response = "") => {
        settled = true;
        deferred.resolve(response);
      },
      fail: (error) => {
        settled = true;
        deferred.reject(error);
      },
      get settled() {
        return settled;
      },
    });
    return deferred.promise;
  };

  const session: MockEngineSession = {
    id,
    config,
    messages,
    turns,
    get ended() {
      return flag.ended;
    },

    emit: (event, payload = {}) => hook(event, payload),

    currentTurn,

    finish(response) {
      const turn = currentTurn();
      if (!turn) throw new Error(`No open turn on ${id}`);
      turn.finish(response);
    },

    fail(error) {
      const turn = currentTurn();
      if (!turn) throw new Error(`No open turn on ${id}`);
      turn.fail(error);
    },

    async execute(message) {
      messages.push(message);
      if (options.manual) {
        return openTurn(message);
      }

      if (options.delay) {
        const delay = options.delay;
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
      }
      for (const [event, payload] of scriptTurn(options)) {
        hook(event, payload ?? {});
      }
      if (options.error) {
        throw options.error;
      }
      return options.response ?? options.streamDeltas?.join("") ?? "";
    },

    providers: () =>
      (options.providers ?? []).map((provider, index) =>
        index === 0 && model ? { ...provider, model } : provider,
      ),

    setModel: (next) => {
      if (!options.providers || options.providers.length === 0) return false;
      model = next;
      return true;
    },
  };

  return {
    session,
    end: () => {
      flag.ended = true;
    },
  };
}

// ============================================================================
// Recording Display
// ============================================================================

export type DisplayMethod = keyof ConversationDisplay;

export interface DisplayCall {
  method: DisplayMethod;
  conversationId: string | undefined;
  args: unknown[];
}

export interface RecordingDisplay extends ConversationDisplay {
  readonly calls: DisplayCall[];
  /** Calls addressed to one conversation, in order */
  callsFor(conversationId: string): DisplayCall[];
  /** Method names called for one conversation, in order */
  methodsFor(conversationId: string): DisplayMethod[];
  /** Latest accumulated text a block-delta carried for a conversation */
  streamText(conversationId: string): string;
  /** Final texts of every block-end for a conversation */
  blockEnds(conversationId: string): string[];
  clear(): void;
}

/**
 * A display that records every call it receives.
 */
export function createRecordingDisplay(): RecordingDisplay {
  const calls: DisplayCall[] = [];

  const record = (method: DisplayMethod, conversationId: string | undefined, args: unknown[]) => {
    calls.push({ method, conversationId, args });
  };

  const callsFor = (conversationId: string): DisplayCall[] =>
    calls.filter((call) => call.conversationId === conversationId);

  return {
    calls,
    callsFor,
    methodsFor: (conversationId) => callsFor(conversationId).map((call) => call.method),

    streamText(conversationId) {
      const deltas = callsFor(conversationId).filter((call) => call.method === "onStreamBlockDelta");
      const last = deltas.at(-1);
      return last ? String(last.args[1]) : "";
    },

    blockEnds: (conversationId) =>
      callsFor(conversationId)
        .filter((call) => call.method === "onStreamBlockEnd")
        .map((call) => String(call.args[1])),

    clear() {
      calls.length = 0;
    },

    addSystemMessage: (text, conversationId) => record("addSystemMessage", conversationId, [text]),
    addUserMessage: (text, conversationId) => record("addUserMessage", conversationId, [text]),
    addAssistantMessage: (text, conversationId) =>
      record("addAssistantMessage", conversationId, [text]),
    showError: (text, conversationId) => record("showError", conversationId, [text]),
    updateStatus: (text, conversationId) => record("updateStatus", conversationId, [text]),
    startProcessing: (label, conversationId) => record("startProcessing", conversationId, [label]),
    finishProcessing: (conversationId) => record("finishProcessing", conversationId, []),

    onStreamBlockStart: (conversationId, blockType) =>
      record("onStreamBlockStart", conversationId, [blockType]),
    onStreamBlockDelta: (conversationId, blockType, accumulatedText) =>
      record("onStreamBlockDelta", conversationId, [blockType, accumulatedText]),
    onStreamBlockEnd: (conversationId, blockType, finalText, hadBlockStart) =>
      record("onStreamBlockEnd", conversationId, [blockType, finalText, hadBlockStart]),
    onStreamToolStart: (conversationId, name, toolInput) =>
      record("onStreamToolStart", conversationId, [name, toolInput]),
    onStreamToolEnd: (conversationId, name, toolInput, result) =>
      record("onStreamToolEnd", conversationId, [name, toolInput, result]),
    onStreamUsageUpdate: (conversationId) => record("onStreamUsageUpdate", conversationId, []),
  };
}

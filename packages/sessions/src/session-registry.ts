/**
 * Session Registry
 *
 * Keyed collection of session handles, one per conversation. The handle map
 * is the only structure shared between conversations. Creation reserves its
 * id synchronously before awaiting the engine, so two creations of the same
 * id cannot both win and no creation waits on another conversation.
 */

import { randomUUID } from "node:crypto";
import { Logger } from "@switchboard/kernel";
import { ConfigurationError, NotFoundError } from "@switchboard/shared";
import {
  parseSessionEngineConfig,
  type SessionEngineConfig,
  type SessionEngineConfigInput,
} from "./config.js";
import type { EngineSession, ExecutionEngine } from "./engine.js";
import { SessionHandle, type SessionHandleOptions } from "./session-handle.js";

const log = Logger.for("SessionRegistry");

export interface SessionRegistryOptions extends SessionEngineConfigInput {
  engine: ExecutionEngine;
}

export interface CreateSessionOptions {
  /** Omit to generate an id and make the session the default */
  conversationId?: string;
  workingDir?: string;
  model?: string;
}

export class SessionRegistry {
  private readonly engine: ExecutionEngine;
  private readonly config: SessionEngineConfig;
  private handles = new Map<string, SessionHandle>();
  private pending = new Map<string, Promise<SessionHandle>>();
  private defaultId: string | null = null;

  constructor(options: SessionRegistryOptions) {
    const { engine, ...config } = options;
    this.engine = engine;
    this.config = parseSessionEngineConfig(config);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Create a session for a conversation.
   *
   * @throws ConfigurationError if the conversation already has a live (or
   * in-flight) session
   */
  createSession(options: CreateSessionOptions = {}): Promise<SessionHandle> {
    return this.register(options, (conversationId, handleOptions) =>
      SessionHandle.create(conversationId, this.engine, handleOptions),
    );
  }

  /**
   * Reattach a conversation to an existing engine session.
   *
   * @throws ConfigurationError if the engine cannot resume sessions or the
   * conversation already has a live session
   */
  resumeSession(engineSessionId: string, options: CreateSessionOptions = {}): Promise<SessionHandle> {
    return this.register(options, (conversationId, handleOptions) =>
      SessionHandle.resume(engineSessionId, conversationId, this.engine, handleOptions),
    );
  }

  private async register(
    options: CreateSessionOptions,
    open: (conversationId: string, options: SessionHandleOptions) => Promise<SessionHandle>,
  ): Promise<SessionHandle> {
    const autoGenerated = options.conversationId === undefined;
    const conversationId = options.conversationId ?? randomUUID();

    if (this.handles.has(conversationId) || this.pending.has(conversationId)) {
      throw ConfigurationError.duplicateSession(conversationId);
    }

    const creation = open(conversationId, {
      workingDir: options.workingDir ?? this.config.workingDir,
      model: options.model ?? this.config.model,
      toolResultLimit: this.config.toolResultLimit,
    });
    this.pending.set(conversationId, creation);

    let handle: SessionHandle;
    try {
      handle = await creation;
    } finally {
      this.pending.delete(conversationId);
    }

    this.handles.set(conversationId, handle);
    if (autoGenerated) {
      this.defaultId = conversationId;
    }

    log.debug({ conversationId, sessionId: handle.sessionId }, "session registered");
    return handle;
  }

  /**
   * End a conversation's session and drop its handle. Ending a conversation
   * that has no session is a no-op.
   */
  async endSession(conversationId?: string): Promise<void> {
    const id = conversationId ?? this.defaultId;
    if (id === null) return;

    const creation = this.pending.get(id);
    if (creation) {
      // Let the in-flight creation land, then tear it down.
      await creation.catch(() => undefined);
    }

    const handle = this.handles.get(id);
    if (!handle) return;

    this.forget(id);
    await handle.close(this.engine);
    log.debug({ conversationId: id }, "session ended");
  }

  /**
   * Drop a handle without ending its engine session.
   */
  removeHandle(conversationId: string): void {
    const handle = this.handles.get(conversationId);
    if (!handle) return;
    this.forget(conversationId);
    handle.detach();
  }

  /**
   * End every session.
   */
  async endAll(): Promise<void> {
    const ids = new Set([...this.handles.keys(), ...this.pending.keys()]);
    await Promise.all([...ids].map((id) => this.endSession(id)));
  }

  private forget(conversationId: string): void {
    this.handles.delete(conversationId);
    if (this.defaultId === conversationId) {
      this.defaultId = null;
    }
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  getHandle(conversationId: string): SessionHandle | undefined {
    return this.handles.get(conversationId);
  }

  has(conversationId: string): boolean {
    return this.handles.has(conversationId);
  }

  /**
   * Snapshot of every live handle.
   */
  activeHandles(): ReadonlyMap<string, SessionHandle> {
    return new Map(this.handles);
  }

  ids(): string[] {
    return Array.from(this.handles.keys());
  }

  get size(): number {
    return this.handles.size;
  }

  get defaultConversationId(): string | null {
    return this.defaultId;
  }

  /** Validated configuration the registry creates sessions with */
  get settings(): Readonly<SessionEngineConfig> {
    return this.config;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run one turn on a conversation's session.
   *
   * @throws NotFoundError if the conversation has no live session
   */
  async sendMessage(conversationId: string | undefined, text: string): Promise<string> {
    const id = conversationId ?? this.defaultId;
    if (id === null) {
      throw NotFoundError.noDefault();
    }
    const session = this.handles.get(id)?.session;
    if (!session) {
      throw NotFoundError.conversation(id);
    }
    return session.execute(text);
  }

  // ==========================================================================
  // Single-conversation compatibility
  //
  // Callers that predate the registry address one implicit session. These
  // read through to whichever handle is the default; multi-conversation
  // callers use handles directly.
  // ==========================================================================

  private defaultHandle(): SessionHandle | undefined {
    return this.defaultId === null ? undefined : this.handles.get(this.defaultId);
  }

  get session(): EngineSession | null {
    return this.defaultHandle()?.session ?? null;
  }

  get sessionId(): string | null {
    return this.defaultHandle()?.sessionId ?? null;
  }

  get modelName(): string {
    return this.defaultHandle()?.modelName ?? "";
  }

  get contextWindow(): number {
    return this.defaultHandle()?.contextWindow ?? 0;
  }

  get totalInputTokens(): number {
    return this.defaultHandle()?.totalInputTokens ?? 0;
  }

  get totalOutputTokens(): number {
    return this.defaultHandle()?.totalOutputTokens ?? 0;
  }

  resetUsage(): void {
    this.defaultHandle()?.resetUsage();
  }

  switchModel(model: string): boolean {
    return this.defaultHandle()?.switchModel(model) ?? false;
  }

  providerModels(): Array<[model: string, provider: string]> {
    return this.defaultHandle()?.providerModels() ?? [];
  }
}

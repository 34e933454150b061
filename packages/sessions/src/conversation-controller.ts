/**
 * Conversation Controller
 *
 * Drives turns for many conversations at once. Each conversation runs its
 * turns on its own promise chain; nothing here serializes one conversation
 * behind another.
 *
 * Per conversation:
 *
 * ```
 * idle ──send──▶ processing ──turn settles──▶ idle (or next queued message)
 *                    │
 *                  cancel
 *                    ▼
 *                cancelled ──turn settles──▶ idle (or next queued message)
 * ```
 *
 * A message sent while a turn is running goes into a single-slot queue; a
 * later send overwrites it.
 */

import { Logger } from "@switchboard/kernel";
import { ConfigurationError, EngineFailure, NotFoundError, errorMessage } from "@switchboard/shared";
import { finalizeOpenBlock, wireCallbacks } from "./callback-wiring.js";
import type { SessionEngineConfigInput } from "./config.js";
import {
  beginTurn,
  conversationPhase,
  createConversationState,
  resetTurn,
  type ConversationPhase,
  type ConversationState,
  type ConversationStateInit,
} from "./conversation-state.js";
import type { ConversationDisplay } from "./display.js";
import type { ExecutionEngine } from "./engine.js";
import type { SessionHandle } from "./session-handle.js";
import { SessionRegistry } from "./session-registry.js";

const log = Logger.for("ConversationController");

const QUEUED_PREVIEW_LENGTH = 80;

export interface ConversationControllerOptions extends SessionEngineConfigInput {
  engine: ExecutionEngine;
  display: ConversationDisplay;
  /** Clock for response times and delta throttling */
  now?: () => number;
}

export type SendOutcome = "started" | "queued";

interface ManagedConversation {
  state: ConversationState;
  /** The running worker, including any queued follow-ups */
  worker: Promise<void> | null;
}

export class ConversationController {
  readonly registry: SessionRegistry;
  private readonly display: ConversationDisplay;
  private readonly now: () => number;
  private conversations = new Map<string, ManagedConversation>();

  constructor(options: ConversationControllerOptions) {
    const { display, now, ...registryOptions } = options;
    this.registry = new SessionRegistry(registryOptions);
    this.display = display;
    this.now = now ?? Date.now;
  }

  // ==========================================================================
  // Conversations
  // ==========================================================================

  /**
   * Open a conversation. Its engine session is created on the first send.
   *
   * @throws ConfigurationError if the id is already open
   */
  open(init: ConversationStateInit = {}): ConversationState {
    if (init.conversationId !== undefined && this.conversations.has(init.conversationId)) {
      throw ConfigurationError.duplicateConversation(init.conversationId);
    }
    const state = createConversationState(init);
    this.conversations.set(state.conversationId, { state, worker: null });
    return state;
  }

  /**
   * Close a conversation: end its session and drop its state. Closing an
   * unknown conversation is a no-op. Callers reject closing a conversation
   * that `isProcessing`.
   */
  async close(conversationId: string): Promise<void> {
    if (!this.conversations.delete(conversationId)) return;
    await this.registry.endSession(conversationId);
  }

  /**
   * Close every conversation.
   */
  async shutdown(): Promise<void> {
    this.conversations.clear();
    await this.registry.endAll();
  }

  get(conversationId: string): ConversationState | undefined {
    return this.conversations.get(conversationId)?.state;
  }

  ids(): string[] {
    return Array.from(this.conversations.keys());
  }

  isProcessing(conversationId: string): boolean {
    return this.conversations.get(conversationId)?.state.isProcessing ?? false;
  }

  phase(conversationId: string): ConversationPhase | undefined {
    const conversation = this.conversations.get(conversationId);
    return conversation ? conversationPhase(conversation.state) : undefined;
  }

  /**
   * Resolves once the conversation has no turn running or queued.
   */
  async idle(conversationId: string): Promise<void> {
    const conversation = this.conversations.get(conversationId);
    while (conversation?.worker) {
      await conversation.worker;
    }
  }

  private require(conversationId: string): ManagedConversation {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      throw NotFoundError.conversation(conversationId);
    }
    return conversation;
  }

  // ==========================================================================
  // Turns
  // ==========================================================================

  /**
   * Send a message. Starts a turn when the conversation has no worker,
   * otherwise replaces the queued follow-up.
   *
   * @throws NotFoundError if the conversation is not open
   */
  send(conversationId: string, text: string): SendOutcome {
    const conversation = this.require(conversationId);
    const { state } = conversation;

    // A worker that is still winding down picks the queue up before it exits.
    if (state.isProcessing || conversation.worker !== null) {
      state.queuedMessage = text;
      this.display.addSystemMessage(
        `Queued (will send after current response): ${text.slice(0, QUEUED_PREVIEW_LENGTH)}`,
        conversationId,
      );
      return "queued";
    }

    beginTurn(state, this.now());
    conversation.worker = this.runWorker(conversation, text);
    return "started";
  }

  /**
   * Request cooperative cancellation of the running turn. The engine call is
   * left to finish; nothing more from it reaches the display. Any queued
   * follow-up is discarded. Returns false when there was nothing to cancel.
   */
  cancel(conversationId: string): boolean {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) return false;
    const { state } = conversation;
    if (!state.isProcessing || state.streamingCancelled) return false;

    finalizeOpenBlock(conversationId, state, this.display);
    state.streamingCancelled = true;
    state.queuedMessage = null;
    this.display.addSystemMessage("Generation cancelled.", conversationId);
    this.display.finishProcessing(conversationId);
    log.debug({ conversationId }, "turn cancelled");
    return true;
  }

  /**
   * Attach a conversation to an existing engine session.
   *
   * @throws NotFoundError if the conversation is not open
   * @throws ConfigurationError if it already has a session or the engine
   * cannot resume
   */
  async resume(conversationId: string, engineSessionId: string): Promise<SessionHandle> {
    this.require(conversationId);
    const handle = await this.registry.resumeSession(engineSessionId, { conversationId });
    this.display.addSystemMessage(
      `Resumed session ${engineSessionId.slice(0, 12)}...`,
      conversationId,
    );
    return handle;
  }

  private async runWorker(conversation: ManagedConversation, first: string): Promise<void> {
    const { state } = conversation;
    const conversationId = state.conversationId;

    try {
      let message: string | null = first;
      while (message !== null) {
        await this.runTurn(conversation, message);

        message = state.queuedMessage;
        state.queuedMessage = null;
        if (message !== null && this.conversations.get(conversationId) !== conversation) {
          break;
        }
        if (message !== null) {
          beginTurn(state, this.now());
        }
      }
    } catch (error) {
      log.error({ conversationId, err: error }, "conversation worker failed");
      if (state.isProcessing) {
        resetTurn(state, this.now());
      }
    } finally {
      conversation.worker = null;
    }
  }

  private async runTurn(conversation: ManagedConversation, text: string): Promise<void> {
    const { state } = conversation;
    const conversationId = state.conversationId;
    let handle: SessionHandle | undefined;

    try {
      state.userMessageCount++;
      this.display.addUserMessage(text, conversationId);
      this.display.startProcessing("Thinking", conversationId);

      handle = await this.ensureSession(conversationId);
      if (!handle || state.streamingCancelled) return;

      handle.resetUsage();
      handle.refreshModelInfo();
      wireCallbacks(handle, conversationId, state, this.display, {
        deltaThrottleMs: this.registry.settings.deltaThrottleMs,
        now: this.now,
      });

      const message = state.systemPrompt
        ? `[System instructions: ${state.systemPrompt}]\n\n${text}`
        : text;
      const response = await this.registry.sendMessage(conversationId, message);

      if (state.streamingCancelled) return;

      // Engines that do not stream still get their response shown.
      if (!state.gotStreamContent && response) {
        state.lastAssistantText = response;
        state.assistantMessageCount++;
        this.display.addAssistantMessage(response, conversationId);
      }
    } catch (error) {
      const failure = EngineFailure.from(error, conversationId);
      log.warn({ conversationId, code: failure.code, message: failure.message }, "turn failed");
      if (!state.streamingCancelled) {
        this.display.showError(failure.message, conversationId);
      }
    } finally {
      handle?.clearCallbacks();
      const wasCancelled = state.streamingCancelled;
      resetTurn(state, this.now());
      if (!wasCancelled) {
        this.display.finishProcessing(conversationId);
      }
    }
  }

  private async ensureSession(conversationId: string): Promise<SessionHandle | undefined> {
    const existing = this.registry.getHandle(conversationId);
    if (existing) return existing;

    this.display.updateStatus("Starting session...", conversationId);
    try {
      return await this.registry.createSession({ conversationId });
    } catch (error) {
      log.warn({ conversationId, message: errorMessage(error) }, "session creation failed");
      this.display.showError(`Could not start session: ${errorMessage(error)}`, conversationId);
      return undefined;
    }
  }
}

/**
 * Conversation State
 *
 * Per-conversation mutable fields. Owned by exactly one conversation and
 * written only by that conversation's worker and the closures wired for it.
 */

import { randomUUID } from "node:crypto";

export type ConversationPhase = "idle" | "processing" | "cancelled";

export interface ConversationState {
  readonly conversationId: string;

  // Turn state
  isProcessing: boolean;
  streamingCancelled: boolean;
  streamAccumulatedText: string;
  toolCountThisTurn: number;
  gotStreamContent: boolean;
  queuedMessage: string | null;
  processingStartTime: number | null;

  /** A block-start was seen for the block currently streaming */
  hadBlockStart: boolean;
  /** Type of the block currently streaming, "" between blocks */
  streamBlockType: string;

  /** Prefixed to every outgoing message when set */
  systemPrompt: string;
  lastAssistantText: string;

  // Statistics (lifetime of the conversation)
  userMessageCount: number;
  assistantMessageCount: number;
  toolCallCount: number;
  toolUsage: Record<string, number>;
  responseTimes: number[];
}

export interface ConversationStateInit {
  conversationId?: string;
  systemPrompt?: string;
}

export function createConversationState(init: ConversationStateInit = {}): ConversationState {
  return {
    conversationId: init.conversationId ?? randomUUID(),
    isProcessing: false,
    streamingCancelled: false,
    streamAccumulatedText: "",
    toolCountThisTurn: 0,
    gotStreamContent: false,
    queuedMessage: null,
    processingStartTime: null,
    hadBlockStart: false,
    streamBlockType: "",
    systemPrompt: init.systemPrompt ?? "",
    lastAssistantText: "",
    userMessageCount: 0,
    assistantMessageCount: 0,
    toolCallCount: 0,
    toolUsage: {},
    responseTimes: [],
  };
}

/**
 * IDLE → PROCESSING.
 */
export function beginTurn(state: ConversationState, now: number): void {
  state.isProcessing = true;
  state.streamingCancelled = false;
  state.streamAccumulatedText = "";
  state.toolCountThisTurn = 0;
  state.gotStreamContent = false;
  state.processingStartTime = now;
  state.hadBlockStart = false;
  state.streamBlockType = "";
}

/**
 * Back to IDLE defaults. Records the turn's response time when one was
 * started. The queued message and lifetime statistics are left alone.
 */
export function resetTurn(state: ConversationState, now: number): void {
  if (state.processingStartTime !== null) {
    state.responseTimes.push(now - state.processingStartTime);
  }
  state.isProcessing = false;
  state.streamingCancelled = false;
  state.streamAccumulatedText = "";
  state.toolCountThisTurn = 0;
  state.gotStreamContent = false;
  state.processingStartTime = null;
  state.hadBlockStart = false;
  state.streamBlockType = "";
}

export function conversationPhase(state: ConversationState): ConversationPhase {
  if (!state.isProcessing) return "idle";
  return state.streamingCancelled ? "cancelled" : "processing";
}

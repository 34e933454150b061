/**
 * Display Layer
 *
 * What the session engine calls to show things. Streaming methods take an
 * explicit conversation id first, since they run off the conversation's own
 * worker. Simple methods take an optional trailing id; frontends treat a
 * missing id as the currently active conversation.
 *
 * Frontends that render on a single delivery context (a UI thread, a
 * websocket writer) marshal these calls themselves.
 */

import type { DisplayEvent, ToolInput } from "@switchboard/shared";

export interface ConversationDisplay {
  addSystemMessage(text: string, conversationId?: string): void;
  addUserMessage(text: string, conversationId?: string): void;
  addAssistantMessage(text: string, conversationId?: string): void;
  showError(text: string, conversationId?: string): void;
  updateStatus(text: string, conversationId?: string): void;
  startProcessing(label: string, conversationId?: string): void;
  finishProcessing(conversationId?: string): void;

  onStreamBlockStart(conversationId: string, blockType: string): void;
  onStreamBlockDelta(conversationId: string, blockType: string, accumulatedText: string): void;
  onStreamBlockEnd(
    conversationId: string,
    blockType: string,
    finalText: string,
    hadBlockStart: boolean,
  ): void;
  onStreamToolStart(conversationId: string, name: string, toolInput: ToolInput): void;
  onStreamToolEnd(conversationId: string, name: string, toolInput: ToolInput, result: string): void;
  onStreamUsageUpdate(conversationId: string): void;
}

// ============================================================================
// Event display
// ============================================================================

/** Distributes `Omit` over each member of a union */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type DisplayEventInput = DistributiveOmit<DisplayEvent, "sequence" | "timestamp">;

export type DisplayEventSink = (event: DisplayEvent) => void;

export interface EventDisplayOptions {
  /** Clock for event timestamps */
  now?: () => number;
}

/**
 * Adapt the display interface to a stream of `DisplayEvent` objects.
 *
 * Each call becomes one event handed to `sink`, numbered in call order.
 *
 * @example
 * ```typescript
 * const display = createEventDisplay((event) => socket.send(JSON.stringify(event)));
 * const controller = new ConversationController({ engine, display });
 * ```
 */
export function createEventDisplay(
  sink: DisplayEventSink,
  options: EventDisplayOptions = {},
): ConversationDisplay {
  const now = options.now ?? Date.now;
  let sequence = 0;

  const emit = (event: DisplayEventInput): void => {
    sink({ ...event, sequence: sequence++, timestamp: now() });
  };

  return {
    addSystemMessage: (text, conversationId) =>
      emit({ type: "system_message", text, conversationId }),
    addUserMessage: (text, conversationId) => emit({ type: "user_message", text, conversationId }),
    addAssistantMessage: (text, conversationId) =>
      emit({ type: "assistant_message", text, conversationId }),
    showError: (text, conversationId) => emit({ type: "error", text, conversationId }),
    updateStatus: (text, conversationId) => emit({ type: "status", text, conversationId }),
    startProcessing: (label, conversationId) =>
      emit({ type: "processing_start", label, conversationId }),
    finishProcessing: (conversationId) => emit({ type: "processing_end", conversationId }),

    onStreamBlockStart: (conversationId, blockType) =>
      emit({ type: "block_start", conversationId, blockType }),
    onStreamBlockDelta: (conversationId, blockType, accumulatedText) =>
      emit({ type: "block_delta", conversationId, blockType, accumulatedText }),
    onStreamBlockEnd: (conversationId, blockType, finalText, hadBlockStart) =>
      emit({ type: "block_end", conversationId, blockType, finalText, hadBlockStart }),
    onStreamToolStart: (conversationId, name, input) =>
      emit({ type: "tool_start", conversationId, name, input }),
    onStreamToolEnd: (conversationId, name, input, result) =>
      emit({ type: "tool_end", conversationId, name, input, result }),
    onStreamUsageUpdate: (conversationId) => emit({ type: "usage_update", conversationId }),
  };
}

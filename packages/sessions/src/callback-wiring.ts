/**
 * Callback Wiring
 *
 * Turns a handle's low-level callbacks into conversation-addressed display
 * calls. Wiring runs at the start of every turn, so closures from a finished
 * turn are replaced before the next turn can emit anything.
 */

import type { ConversationState } from "./conversation-state.js";
import type { ConversationDisplay } from "./display.js";
import type { SessionHandle } from "./session-handle.js";

export interface WiringOptions {
  /**
   * Minimum ms between delta display updates. Skipped updates are never
   * reordered; the block-end call always carries the complete text.
   */
  deltaThrottleMs?: number;
  /** Clock used for throttling */
  now?: () => number;
}

/**
 * Install this turn's closures on `handle`, each capturing `conversationId`
 * and `state`. Once `state.streamingCancelled` is set every closure drops
 * its event.
 */
export function wireCallbacks(
  handle: SessionHandle,
  conversationId: string,
  state: ConversationState,
  display: ConversationDisplay,
  options: WiringOptions = {},
): void {
  const throttleMs = options.deltaThrottleMs ?? 0;
  const now = options.now ?? Date.now;
  let lastDeltaAt = Number.NEGATIVE_INFINITY;

  const cancelled = (): boolean => state.streamingCancelled;

  handle.installCallbacks({
    onContentBlockStart: (blockType) => {
      if (cancelled()) return;
      state.streamAccumulatedText = "";
      state.hadBlockStart = true;
      state.streamBlockType = blockType;
      lastDeltaAt = Number.NEGATIVE_INFINITY;
      display.onStreamBlockStart(conversationId, blockType);
    },

    onContentBlockDelta: (blockType, delta) => {
      if (cancelled()) return;
      state.streamAccumulatedText += delta;
      state.gotStreamContent = true;
      if (!state.streamBlockType) {
        state.streamBlockType = blockType;
      }

      if (throttleMs > 0) {
        const at = now();
        if (at - lastDeltaAt < throttleMs) return;
        lastDeltaAt = at;
      }
      display.onStreamBlockDelta(conversationId, blockType, state.streamAccumulatedText);
    },

    onContentBlockEnd: (blockType, text) => {
      if (cancelled()) return;
      const finalText = text || state.streamAccumulatedText;
      const hadBlockStart = state.hadBlockStart;
      clearOpenBlock(state);

      if (blockType === "text") {
        state.gotStreamContent = true;
        state.lastAssistantText = finalText;
        state.assistantMessageCount++;
      }
      display.onStreamBlockEnd(conversationId, blockType, finalText, hadBlockStart);
    },

    onToolPre: (name, toolInput) => {
      if (cancelled()) return;
      state.toolCountThisTurn++;
      state.toolCallCount++;
      state.toolUsage[name] = (state.toolUsage[name] ?? 0) + 1;
      display.onStreamToolStart(conversationId, name, toolInput);
    },

    onToolPost: (name, toolInput, result) => {
      if (cancelled()) return;
      display.onStreamToolEnd(conversationId, name, toolInput, result);
    },

    onExecutionStart: () => {
      if (cancelled()) return;
      display.updateStatus("Thinking...", conversationId);
    },

    onExecutionEnd: () => {
      if (cancelled()) return;
      finalizeOpenBlock(conversationId, state, display);
    },

    onUsageUpdate: () => {
      if (cancelled()) return;
      display.onStreamUsageUpdate(conversationId);
    },
  });
}

/**
 * Close a block that streamed content but never saw its end event, handing
 * the display whatever text accumulated.
 */
export function finalizeOpenBlock(
  conversationId: string,
  state: ConversationState,
  display: ConversationDisplay,
): void {
  if (!state.hadBlockStart || !state.streamAccumulatedText) {
    clearOpenBlock(state);
    return;
  }
  const blockType = state.streamBlockType || "text";
  const text = state.streamAccumulatedText;
  clearOpenBlock(state);
  display.onStreamBlockEnd(conversationId, blockType, text, true);
}

function clearOpenBlock(state: ConversationState): void {
  state.streamAccumulatedText = "";
  state.hadBlockStart = false;
  state.streamBlockType = "";
}

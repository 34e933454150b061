/**
 * Conversation State Tests
 */

import { describe, it, expect } from "vitest";
import {
  beginTurn,
  conversationPhase,
  createConversationState,
  resetTurn,
} from "../conversation-state.js";

describe("conversation state", () => {
  it("starts idle", () => {
    const state = createConversationState({ conversationId: "c1" });

    expect(conversationPhase(state)).toBe("idle");
    expect(state.queuedMessage).toBeNull();
    expect(state.processingStartTime).toBeNull();
    expect(state.systemPrompt).toBe("");
  });

  it("generates distinct ids", () => {
    expect(createConversationState().conversationId).not.toBe(
      createConversationState().conversationId,
    );
  });

  it("moves through processing and cancelled back to idle", () => {
    const state = createConversationState({ conversationId: "c1" });

    beginTurn(state, 10);
    expect(conversationPhase(state)).toBe("processing");
    expect(state.processingStartTime).toBe(10);

    state.streamingCancelled = true;
    expect(conversationPhase(state)).toBe("cancelled");

    resetTurn(state, 40);
    expect(conversationPhase(state)).toBe("idle");
    expect(state.responseTimes).toEqual([30]);
  });

  it("clears turn fields but keeps the queue and statistics", () => {
    const state = createConversationState({ conversationId: "c1" });
    beginTurn(state, 0);
    state.streamAccumulatedText = "partial";
    state.toolCountThisTurn = 2;
    state.gotStreamContent = true;
    state.hadBlockStart = true;
    state.streamBlockType = "text";
    state.queuedMessage = "next";
    state.toolCallCount = 2;
    state.userMessageCount = 1;

    resetTurn(state, 5);

    expect(state).toMatchObject({
      isProcessing: false,
      streamingCancelled: false,
      streamAccumulatedText: "",
      toolCountThisTurn: 0,
      gotStreamContent: false,
      hadBlockStart: false,
      streamBlockType: "",
      processingStartTime: null,
      queuedMessage: "next",
      toolCallCount: 2,
      userMessageCount: 1,
    });
  });

  it("records no response time for a turn that never started", () => {
    const state = createConversationState();

    resetTurn(state, 100);

    expect(state.responseTimes).toEqual([]);
  });
});

/**
 * Event Display Tests
 */

import { describe, it, expect } from "vitest";
import { isStreamDisplayEvent, type DisplayEvent } from "@switchboard/shared";
import { createEventDisplay } from "../display.js";

describe("createEventDisplay", () => {
  it("numbers events in call order", () => {
    const events: DisplayEvent[] = [];
    const display = createEventDisplay((event) => events.push(event), { now: () => 1000 });

    display.addSystemMessage("hi", "c1");
    display.onStreamBlockDelta("c1", "text", "ab");
    display.finishProcessing();

    expect(events).toEqual([
      { type: "system_message", text: "hi", conversationId: "c1", sequence: 0, timestamp: 1000 },
      {
        type: "block_delta",
        conversationId: "c1",
        blockType: "text",
        accumulatedText: "ab",
        sequence: 1,
        timestamp: 1000,
      },
      { type: "processing_end", conversationId: undefined, sequence: 2, timestamp: 1000 },
    ]);
  });

  it("maps every streaming call to a stream event", () => {
    const events: DisplayEvent[] = [];
    const display = createEventDisplay((event) => events.push(event));

    display.onStreamBlockStart("c1", "text");
    display.onStreamBlockEnd("c1", "text", "done", true);
    display.onStreamToolStart("c1", "grep", { pattern: "x" });
    display.onStreamToolEnd("c1", "grep", { pattern: "x" }, "1 match");
    display.onStreamUsageUpdate("c1");
    display.showError("boom", "c1");

    expect(events.map((e) => e.type)).toEqual([
      "block_start",
      "block_end",
      "tool_start",
      "tool_end",
      "usage_update",
      "error",
    ]);
    expect(events.map(isStreamDisplayEvent)).toEqual([true, true, true, true, true, false]);
    expect(events[3]).toMatchObject({ name: "grep", input: { pattern: "x" }, result: "1 match" });
  });
});

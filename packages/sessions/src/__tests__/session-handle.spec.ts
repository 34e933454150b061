/**
 * Session Handle Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { isConfigurationError } from "@switchboard/shared";
import { SessionHandle } from "../session-handle.js";
import { createMockEngine, type MockEngine } from "../testing.js";

describe("SessionHandle", () => {
  let engine: MockEngine;
  let handle: SessionHandle;

  beforeEach(async () => {
    engine = createMockEngine();
    handle = await SessionHandle.create("c1", engine, { workingDir: "/work" });
  });

  describe("create", () => {
    it("binds the engine stream hook to the handle's dispatch", () => {
      const session = engine.sessions[0];

      expect(session.config.onStream).toBe(handle.dispatch);
      expect(session.config.workingDir).toBe("/work");
      expect(handle.sessionId).toBe("mock-session-1");
      expect(handle.conversationId).toBe("c1");
      expect(handle.isOpen).toBe(true);
    });

    it("routes events emitted by its own session only", async () => {
      const other = await SessionHandle.create("c2", engine, { workingDir: "/work" });
      const mine = vi.fn();
      const theirs = vi.fn();
      handle.installCallbacks({ onExecutionStart: mine });
      other.installCallbacks({ onExecutionStart: theirs });

      engine.sessions[1].emit("execution:start");

      expect(mine).not.toHaveBeenCalled();
      expect(theirs).toHaveBeenCalledTimes(1);
    });

    it("reads model info from the first provider", async () => {
      const withProviders = createMockEngine({
        providers: [
          { provider: "primary", model: "m-base", contextWindow: 200000 },
          { provider: "backup", model: "m-small" },
        ],
      });
      const h = await SessionHandle.create("c1", withProviders, { workingDir: "/work" });

      expect(h.modelName).toBe("m-base");
      expect(h.contextWindow).toBe(200000);
      expect(h.providerModels()).toEqual([
        ["m-base", "primary"],
        ["m-small", "backup"],
      ]);
    });

    it("switches to the requested model", async () => {
      const withProviders = createMockEngine({
        providers: [{ provider: "primary", model: "m-base" }],
      });
      const h = await SessionHandle.create("c1", withProviders, {
        workingDir: "/work",
        model: "m-fast",
      });

      expect(h.modelName).toBe("m-fast");
    });
  });

  describe("resume", () => {
    it("reattaches to an existing engine session", async () => {
      const h = await SessionHandle.resume("prior-session", "c9", engine, { workingDir: "/work" });

      expect(h.sessionId).toBe("prior-session");
      expect(engine.sessionById("prior-session").config.onStream).toBe(h.dispatch);
    });

    it("fails when the engine cannot resume", async () => {
      const fixed = createMockEngine({ resumable: false });

      await expect(
        SessionHandle.resume("prior-session", "c9", fixed, { workingDir: "/work" }),
      ).rejects.toSatisfy(isConfigurationError);
    });
  });

  describe("dispatch", () => {
    it("forwards block start with defaults", () => {
      const onContentBlockStart = vi.fn();
      handle.installCallbacks({ onContentBlockStart });

      handle.dispatch("content_block:start", {});
      handle.dispatch("content_block:start", { block_type: "thinking", block_index: 2 });

      expect(onContentBlockStart.mock.calls).toEqual([
        ["text", 0],
        ["thinking", 2],
      ]);
    });

    it("takes the first non-empty of delta, text and content", () => {
      const onContentBlockDelta = vi.fn();
      handle.installCallbacks({ onContentBlockDelta });

      handle.dispatch("content_block:delta", { delta: "a" });
      handle.dispatch("content_block:delta", { delta: "", text: "b" });
      handle.dispatch("content_block:delta", { block_type: "thinking", content: "c" });
      handle.dispatch("content_block:delta", { delta: "" });

      expect(onContentBlockDelta.mock.calls).toEqual([
        ["text", "a"],
        ["text", "b"],
        ["thinking", "c"],
      ]);
    });

    it("normalizes block end by block type", () => {
      const onContentBlockEnd = vi.fn();
      handle.installCallbacks({ onContentBlockEnd });

      handle.dispatch("content_block:end", { block: { type: "text", text: "done" } });
      handle.dispatch("content_block:end", { block: { type: "reasoning", thinking: "hmm" } });
      handle.dispatch("content_block:end", { block: { type: "thinking", text: "fallback" } });
      handle.dispatch("content_block:end", { block: { type: "tool_use" } });
      handle.dispatch("content_block:end", {});

      expect(onContentBlockEnd.mock.calls).toEqual([
        ["text", "done"],
        ["thinking", "hmm"],
        ["thinking", "fallback"],
      ]);
    });

    it("forwards tool events with defaults", () => {
      const onToolPre = vi.fn();
      const onToolPost = vi.fn();
      handle.installCallbacks({ onToolPre, onToolPost });

      handle.dispatch("tool:pre", { tool_name: "grep", tool_input: { pattern: "TODO" } });
      handle.dispatch("tool:pre", {});
      handle.dispatch("tool:post", { tool_name: "grep", tool_input: { pattern: "TODO" }, result: 3 });

      expect(onToolPre.mock.calls).toEqual([
        ["grep", { pattern: "TODO" }],
        ["unknown", {}],
      ]);
      expect(onToolPost.mock.calls).toEqual([["grep", { pattern: "TODO" }, "3"]]);
    });

    it("renders object tool results as indented JSON", () => {
      const onToolPost = vi.fn();
      handle.installCallbacks({ onToolPost });

      handle.dispatch("tool:post", { tool_name: "read", result: { ok: true } });

      expect(onToolPost).toHaveBeenCalledWith("read", {}, '{\n  "ok": true\n}');
    });

    it("truncates tool results to the configured limit", async () => {
      const h = await SessionHandle.create("c2", engine, { workingDir: "/work", toolResultLimit: 5 });
      const onToolPost = vi.fn();
      h.installCallbacks({ onToolPost });

      h.dispatch("tool:post", { tool_name: "read", result: "abcdefghij" });

      expect(onToolPost).toHaveBeenCalledWith("read", {}, "abcde");
    });

    it("truncates by code point without splitting surrogate pairs", async () => {
      const h = await SessionHandle.create("c2", engine, { workingDir: "/work", toolResultLimit: 3 });
      const onToolPost = vi.fn();
      h.installCallbacks({ onToolPost });

      h.dispatch("tool:post", { tool_name: "read", result: "ab\u{1F600}cd" });
      h.dispatch("tool:post", { tool_name: "read", result: "\u{1F600}\u{1F600}\u{1F600}\u{1F600}" });

      expect(onToolPost.mock.calls).toEqual([
        ["read", {}, "ab\u{1F600}"],
        ["read", {}, "\u{1F600}\u{1F600}\u{1F600}"],
      ]);
    });

    it("accumulates usage and keeps the first model name", () => {
      const onUsageUpdate = vi.fn();
      handle.installCallbacks({ onUsageUpdate });

      handle.dispatch("llm:response", { usage: { input: 10, output: 5 }, model: "m-1" });
      handle.dispatch("llm:response", { usage: { input: 3, output: 2 }, model: "m-2" });
      handle.dispatch("llm:response", {});

      expect(handle.totalInputTokens).toBe(13);
      expect(handle.totalOutputTokens).toBe(7);
      expect(handle.modelName).toBe("m-1");
      expect(onUsageUpdate).toHaveBeenCalledTimes(3);
    });

    it("counts usage even with no callbacks installed", () => {
      handle.dispatch("llm:response", { usage: { input: 4, output: 1 } });

      expect(handle.totalInputTokens).toBe(4);
      expect(handle.totalOutputTokens).toBe(1);
    });

    it("ignores unknown events", () => {
      const onExecutionEnd = vi.fn();
      handle.installCallbacks({ onExecutionEnd });

      expect(() => handle.dispatch("session:fork", { anything: true })).not.toThrow();
      expect(onExecutionEnd).not.toHaveBeenCalled();
    });

    it("drops payloads that are not objects", () => {
      const onContentBlockStart = vi.fn();
      const onUsageUpdate = vi.fn();
      handle.installCallbacks({ onContentBlockStart, onUsageUpdate });

      handle.dispatch("content_block:start", "not an object");
      handle.dispatch("llm:response", 42);

      expect(onContentBlockStart).not.toHaveBeenCalled();
      expect(onUsageUpdate).not.toHaveBeenCalled();
    });

    it("treats null and mistyped fields as absent", () => {
      const onContentBlockStart = vi.fn();
      const onContentBlockDelta = vi.fn();
      const onContentBlockEnd = vi.fn();
      const onUsageUpdate = vi.fn();
      handle.installCallbacks({
        onContentBlockStart,
        onContentBlockDelta,
        onContentBlockEnd,
        onUsageUpdate,
      });

      handle.dispatch("content_block:start", { block_type: null, block_index: 1.5 });
      handle.dispatch("content_block:start", { block_index: -2 });
      handle.dispatch("content_block:delta", { delta: null, text: "hi" });
      handle.dispatch("content_block:delta", { delta: 7, content: "there" });
      handle.dispatch("content_block:end", { block: { type: "text", text: null } });
      handle.dispatch("llm:response", { usage: { input: -1, output: 3 }, model: null });

      expect(onContentBlockStart.mock.calls).toEqual([
        ["text", 0],
        ["text", 0],
      ]);
      expect(onContentBlockDelta.mock.calls).toEqual([
        ["text", "hi"],
        ["text", "there"],
      ]);
      expect(onContentBlockEnd.mock.calls).toEqual([["text", ""]]);
      expect(onUsageUpdate).toHaveBeenCalledTimes(1);
      expect(handle.totalInputTokens).toBe(0);
      expect(handle.totalOutputTokens).toBe(3);
    });

    it("wraps tool input that is not an object", () => {
      const onToolPre = vi.fn();
      const onToolPost = vi.fn();
      handle.installCallbacks({ onToolPre, onToolPost });

      handle.dispatch("tool:pre", { tool_name: "bash", tool_input: "ls -la" });
      handle.dispatch("tool:pre", { tool_name: "batch", tool_input: ["a", "b"] });
      handle.dispatch("tool:pre", { tool_name: null, tool_input: null });
      handle.dispatch("tool:post", { tool_name: "bash", tool_input: "ls -la", result: "ok" });

      expect(onToolPre.mock.calls).toEqual([
        ["bash", { input: "ls -la" }],
        ["batch", { input: ["a", "b"] }],
        ["unknown", {}],
      ]);
      expect(onToolPost.mock.calls).toEqual([["bash", { input: "ls -la" }, "ok"]]);
    });

    it("treats a missing payload as empty", () => {
      const onContentBlockStart = vi.fn();
      handle.installCallbacks({ onContentBlockStart });

      handle.dispatch("content_block:start", undefined);

      expect(onContentBlockStart).toHaveBeenCalledWith("text", 0);
    });

    it("contains a throwing callback", () => {
      handle.installCallbacks({
        onExecutionStart: () => {
          throw new Error("render failed");
        },
      });

      expect(() => handle.dispatch("execution:start", {})).not.toThrow();
    });

    it("tolerates unset slots", () => {
      expect(() => {
        handle.dispatch("content_block:start", {});
        handle.dispatch("content_block:delta", { delta: "x" });
        handle.dispatch("content_block:end", { block: { type: "text", text: "x" } });
        handle.dispatch("tool:pre", {});
        handle.dispatch("tool:post", {});
        handle.dispatch("execution:start", {});
        handle.dispatch("execution:end", {});
      }).not.toThrow();
    });
  });

  describe("installCallbacks", () => {
    it("replaces every slot", () => {
      const first = vi.fn();
      const second = vi.fn();

      handle.installCallbacks({ onExecutionStart: first });
      handle.installCallbacks({ onExecutionEnd: second });
      handle.dispatch("execution:start", {});
      handle.dispatch("execution:end", {});

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });

    it("clearCallbacks silences every slot", () => {
      const onExecutionStart = vi.fn();
      handle.installCallbacks({ onExecutionStart });

      handle.clearCallbacks();
      handle.dispatch("execution:start", {});

      expect(onExecutionStart).not.toHaveBeenCalled();
    });
  });

  describe("usage and model", () => {
    it("resetUsage zeroes counters", () => {
      handle.dispatch("llm:response", { usage: { input: 10, output: 5 }, model: "m-1" });

      handle.resetUsage();

      expect(handle.totalInputTokens).toBe(0);
      expect(handle.totalOutputTokens).toBe(0);
      expect(handle.modelName).toBe("");
      expect(handle.contextWindow).toBe(0);
    });

    it("switchModel returns false when the session has no providers", () => {
      expect(handle.switchModel("m-fast")).toBe(false);
      expect(handle.modelName).toBe("");
      expect(handle.providerModels()).toEqual([]);
    });

    it("switchModel updates the model name on success", async () => {
      const withProviders = createMockEngine({
        providers: [{ provider: "primary", model: "m-base" }],
      });
      const h = await SessionHandle.create("c1", withProviders, { workingDir: "/work" });

      expect(h.switchModel("m-fast")).toBe(true);
      expect(h.modelName).toBe("m-fast");
      expect(h.providerModels()).toEqual([["m-fast", "primary"]]);
    });
  });

  describe("close", () => {
    it("ends the engine session once", async () => {
      await handle.close(engine);
      await handle.close(engine);

      expect(engine.endedSessionIds).toEqual(["mock-session-1"]);
      expect(engine.sessions[0].ended).toBe(true);
      expect(handle.session).toBeNull();
      expect(handle.isOpen).toBe(false);
    });

    it("drops callbacks so late events go nowhere", async () => {
      const onExecutionStart = vi.fn();
      handle.installCallbacks({ onExecutionStart });

      await handle.close(engine);
      engine.sessions[0].emit("execution:start");

      expect(onExecutionStart).not.toHaveBeenCalled();
    });

    it("swallows engine teardown failures", async () => {
      engine.endSession = async () => {
        throw new Error("already gone");
      };

      await expect(handle.close(engine)).resolves.toBeUndefined();
      expect(handle.session).toBeNull();
    });
  });
});

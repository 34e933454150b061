/**
 * Execution Engine Event Protocol
 *
 * Event names and payload schemas for the low-level stream an execution
 * engine emits while running a turn. Payload keys follow the engine's wire
 * format (snake_case). Every field is optional; dispatch applies defaults.
 * Only a payload that is not an object fails validation.
 *
 * @module @switchboard/shared/engine-events
 */

import { z } from "zod";

export const EngineEvents = {
  CONTENT_BLOCK_START: "content_block:start",
  CONTENT_BLOCK_DELTA: "content_block:delta",
  CONTENT_BLOCK_END: "content_block:end",
  TOOL_PRE: "tool:pre",
  TOOL_POST: "tool:post",
  EXECUTION_START: "execution:start",
  EXECUTION_END: "execution:end",
  LLM_RESPONSE: "llm:response",
} as const;

export type EngineEventName = (typeof EngineEvents)[keyof typeof EngineEvents];

const ENGINE_EVENT_NAMES = new Set<string>(Object.values(EngineEvents));

export function isEngineEventName(name: string): name is EngineEventName {
  return ENGINE_EVENT_NAMES.has(name);
}

// ============================================================================
// Payload schemas
// ============================================================================

/** Optional payload field; a mistyped value parses as undefined. */
function field<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().catch(undefined);
}

const blockIndex = field(z.number().int().nonnegative());

export const blockStartPayloadSchema = z.object({
  block_type: field(z.string()),
  block_index: blockIndex,
});

export const blockDeltaPayloadSchema = z.object({
  block_type: field(z.string()),
  block_index: blockIndex,
  delta: field(z.string()),
  text: field(z.string()),
  content: field(z.string()),
});

export const blockEndPayloadSchema = z.object({
  block_index: blockIndex,
  block: field(
    z.object({
      type: field(z.string()),
      text: field(z.string()),
      thinking: field(z.string()),
    }),
  ),
});

/** `tool_input` is usually an object; engines also send command strings and arrays */
export const toolPrePayloadSchema = z.object({
  tool_name: field(z.string()),
  tool_input: z.unknown(),
});

export const toolPostPayloadSchema = toolPrePayloadSchema.extend({
  result: z.unknown(),
});

export const llmResponsePayloadSchema = z.object({
  model: field(z.string()),
  usage: field(
    z.object({
      input: field(z.number().nonnegative()),
      output: field(z.number().nonnegative()),
    }),
  ),
});

export type BlockStartPayload = z.infer<typeof blockStartPayloadSchema>;
export type BlockDeltaPayload = z.infer<typeof blockDeltaPayloadSchema>;
export type BlockEndPayload = z.infer<typeof blockEndPayloadSchema>;
export type ToolPrePayload = z.infer<typeof toolPrePayloadSchema>;
export type ToolPostPayload = z.infer<typeof toolPostPayloadSchema>;
export type LlmResponsePayload = z.infer<typeof llmResponsePayloadSchema>;

export type ToolInput = Record<string, unknown>;

/**
 * The hook an engine calls for every event of a session's turn.
 */
export type StreamHook = (event: string, payload: unknown) => void;

/**
 * Display Event Types
 *
 * Conversation-addressed UI events as a discriminated union, for frontends
 * that forward display calls over a transport instead of rendering in process.
 *
 * @module @switchboard/shared/display-events
 */

import type { ToolInput } from "./engine-events.js";

interface DisplayEventBase {
  /** Conversation the event belongs to; absent means the active one */
  conversationId?: string;
  /** Monotonic per-sink sequence number */
  sequence: number;
  timestamp: number;
}

export interface SystemMessageEvent extends DisplayEventBase {
  type: "system_message";
  text: string;
}

export interface UserMessageEvent extends DisplayEventBase {
  type: "user_message";
  text: string;
}

export interface AssistantMessageEvent extends DisplayEventBase {
  type: "assistant_message";
  text: string;
}

export interface ErrorEvent extends DisplayEventBase {
  type: "error";
  text: string;
}

export interface StatusEvent extends DisplayEventBase {
  type: "status";
  text: string;
}

export interface ProcessingStartEvent extends DisplayEventBase {
  type: "processing_start";
  label: string;
}

export interface ProcessingEndEvent extends DisplayEventBase {
  type: "processing_end";
}

export interface BlockStartEvent extends DisplayEventBase {
  type: "block_start";
  conversationId: string;
  blockType: string;
}

export interface BlockDeltaEvent extends DisplayEventBase {
  type: "block_delta";
  conversationId: string;
  blockType: string;
  accumulatedText: string;
}

export interface BlockEndEvent extends DisplayEventBase {
  type: "block_end";
  conversationId: string;
  blockType: string;
  finalText: string;
  hadBlockStart: boolean;
}

export interface ToolStartEvent extends DisplayEventBase {
  type: "tool_start";
  conversationId: string;
  name: string;
  input: ToolInput;
}

export interface ToolEndEvent extends DisplayEventBase {
  type: "tool_end";
  conversationId: string;
  name: string;
  input: ToolInput;
  result: string;
}

export interface UsageUpdateEvent extends DisplayEventBase {
  type: "usage_update";
  conversationId: string;
}

export type DisplayEvent =
  | SystemMessageEvent
  | UserMessageEvent
  | AssistantMessageEvent
  | ErrorEvent
  | StatusEvent
  | ProcessingStartEvent
  | ProcessingEndEvent
  | BlockStartEvent
  | BlockDeltaEvent
  | BlockEndEvent
  | ToolStartEvent
  | ToolEndEvent
  | UsageUpdateEvent;

export type DisplayEventType = DisplayEvent["type"];

/**
 * Events that originate from a streaming turn and always carry a conversation id.
 */
export type StreamDisplayEvent = Extract<DisplayEvent, { conversationId: string }>;

const STREAM_EVENT_TYPES: ReadonlySet<DisplayEventType> = new Set<DisplayEventType>([
  "block_start",
  "block_delta",
  "block_end",
  "tool_start",
  "tool_end",
  "usage_update",
]);

export function isStreamDisplayEvent(event: DisplayEvent): event is StreamDisplayEvent {
  return STREAM_EVENT_TYPES.has(event.type);
}

/**
 * # Switchboard Shared Types
 *
 * Platform-independent definitions shared across all Switchboard packages:
 *
 * - **Errors** - the conversation-scoped error taxonomy
 * - **Engine events** - names and payload schemas of the execution engine stream
 * - **Display events** - conversation-addressed UI events for transports
 *
 * @module @switchboard/shared
 */

export * from "./errors.js";
export * from "./engine-events.js";
export * from "./display-events.js";

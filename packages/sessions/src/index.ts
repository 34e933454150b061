/**
 * # Switchboard Sessions
 *
 * Runs streaming agent turns for many conversations at once, keeping each
 * conversation's session, callbacks, state and cancellation isolated.
 *
 * - **SessionHandle** - one conversation's engine session, callback slots and counters
 * - **SessionRegistry** - creation, lookup and teardown of handles
 * - **wireCallbacks** - per-turn closures from engine events to display calls
 * - **ConversationController** - queueing, cancellation and the per-conversation worker
 *
 * ## Example
 *
 * ```typescript
 * import { ConversationController, createEventDisplay } from "@switchboard/sessions";
 *
 * const controller = new ConversationController({
 *   engine,
 *   display: createEventDisplay((event) => socket.send(JSON.stringify(event))),
 * });
 *
 * controller.open({ conversationId: "tab-1" });
 * controller.open({ conversationId: "tab-2" });
 * controller.send("tab-1", "Summarize the README");
 * controller.send("tab-2", "List open TODOs");
 * ```
 *
 * @module @switchboard/sessions
 */

export * from "./config.js";
export * from "./engine.js";
export * from "./display.js";
export * from "./conversation-state.js";
export * from "./session-handle.js";
export * from "./session-registry.js";
export * from "./callback-wiring.js";
export * from "./conversation-controller.js";

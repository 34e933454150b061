/**
 * # Switchboard Kernel
 *
 * Low-level primitives the other Switchboard packages build on:
 *
 * - **Logger** - structured, leveled logging (pino)
 *
 * @module @switchboard/kernel
 */

export * from "./logger.js";

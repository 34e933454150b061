/**
 * Execution Engine Contract
 *
 * The session engine never runs an agent turn itself. It consumes an engine
 * through these interfaces. Engines must be safe to call concurrently for
 * distinct sessions and must run at most one turn per session at a time.
 */

import type { StreamHook } from "@switchboard/shared";

export interface EngineSessionConfig {
  workingDir: string;
  /** Model override for the new session */
  model?: string;
  /**
   * Receives every event of this session's turns. Bound once when the
   * session is created and never replaced.
   */
  onStream: StreamHook;
}

export interface ProviderModelInfo {
  /** Provider module name */
  provider: string;
  model?: string;
  contextWindow?: number;
}

export interface EngineSession {
  readonly id: string;

  /** Run one turn. Resolves with the final response text. */
  execute(message: string): Promise<string>;

  /** Models the session's providers are configured with, first = active */
  providers?(): ProviderModelInfo[];

  /** Switch the active provider's model. Returns false when unsupported. */
  setModel?(model: string): boolean;
}

export interface ExecutionEngine {
  createSession(config: EngineSessionConfig): Promise<EngineSession>;
  resumeSession?(sessionId: string, config: EngineSessionConfig): Promise<EngineSession>;
  endSession(session: EngineSession): Promise<void>;
}

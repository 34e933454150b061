/**
 * Session Engine Configuration
 */

import { z } from "zod";
import { ConfigurationError } from "@switchboard/shared";

export const sessionEngineConfigSchema = z.object({
  /**
   * Working directory handed to every new engine session
   * @default process.cwd()
   */
  workingDir: z.string().min(1).optional(),

  /**
   * Model to switch new sessions to, when set
   */
  model: z.string().min(1).optional(),

  /**
   * Maximum characters of a tool result forwarded to the display
   * @default 2000
   */
  toolResultLimit: z.number().int().positive().default(2000),

  /**
   * Minimum interval between block-delta display updates for one
   * conversation. 0 forwards every delta.
   * @default 0
   */
  deltaThrottleMs: z.number().int().nonnegative().default(0),
});

export type SessionEngineConfigInput = z.input<typeof sessionEngineConfigSchema>;

export interface SessionEngineConfig {
  workingDir: string;
  model?: string;
  toolResultLimit: number;
  deltaThrottleMs: number;
}

/**
 * Validate options and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseSessionEngineConfig(input: SessionEngineConfigInput = {}): SessionEngineConfig {
  const parsed = sessionEngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.invalid(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }

  const { workingDir, model, toolResultLimit, deltaThrottleMs } = parsed.data;
  return {
    workingDir: workingDir ?? process.cwd(),
    model,
    toolResultLimit,
    deltaThrottleMs,
  };
}

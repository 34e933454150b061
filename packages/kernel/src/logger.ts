/**
 * Logger
 *
 * Structured logging on pino. Each module asks for a named child once at
 * load time and logs with the object-first signature:
 *
 * ```typescript
 * const log = Logger.for("SessionRegistry");
 * log.debug({ conversationId }, "session created");
 * ```
 *
 * Children are resolved lazily, so `Logger.configure()` called after a
 * module has loaded still applies to that module's logger.
 *
 * @module @switchboard/kernel/logger
 */

import pino, { type DestinationStream, type Level, type LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;

export interface LoggerConfig {
  /** Minimum level written. Defaults to `SWITCHBOARD_LOG_LEVEL`, else "info" */
  level?: LogLevel;
  /** Where log lines go. Defaults to stdout */
  destination?: DestinationStream;
  /** Static fields added to every line */
  base?: Record<string, unknown>;
}

export type LogFn = (obj: Record<string, unknown> | string, msg?: string) => void;

export interface ModuleLogger {
  readonly name: string;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  isLevelEnabled(level: Level): boolean;
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function envLevel(): LogLevel | undefined {
  const raw = process.env.SWITCHBOARD_LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === raw);
}

function createRoot(config: LoggerConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level ?? envLevel() ?? "info",
    base: config.base ?? null,
  };
  return config.destination ? pino(options, config.destination) : pino(options);
}

let root: pino.Logger = createRoot({});
let generation = 0;

function bind(child: () => pino.Logger, level: Level): LogFn {
  return (obj, msg) => {
    const logger = child();
    if (typeof obj === "string") {
      logger[level](obj);
    } else {
      logger[level](obj, msg);
    }
  };
}

export const Logger = {
  /**
   * Named logger for a module or class.
   */
  for(name: string): ModuleLogger {
    let cached: pino.Logger | undefined;
    let cachedGeneration = -1;
    const child = (): pino.Logger => {
      if (!cached || cachedGeneration !== generation) {
        cached = root.child({ module: name });
        cachedGeneration = generation;
      }
      return cached;
    };

    return {
      name,
      trace: bind(child, "trace"),
      debug: bind(child, "debug"),
      info: bind(child, "info"),
      warn: bind(child, "warn"),
      error: bind(child, "error"),
      fatal: bind(child, "fatal"),
      isLevelEnabled: (level) => child().isLevelEnabled(level),
    };
  },

  /**
   * Replace the root logger. Existing module loggers pick up the change.
   */
  configure(config: LoggerConfig): void {
    root = createRoot(config);
    generation++;
  },

  /** Current root level */
  get level(): string {
    return root.level;
  },
};

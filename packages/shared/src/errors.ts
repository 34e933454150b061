/**
 * Switchboard Errors
 *
 * Every error raised by the session engine carries a stable `code` and a
 * `details` record. Errors are always conversation-scoped: nothing here is
 * used to tear down more than the conversation that produced it.
 *
 * @module @switchboard/shared/errors
 */

export type SwitchboardErrorCode =
  | "NOT_FOUND"
  | "CONFIGURATION_ERROR"
  | "ENGINE_FAILURE"
  | "MALFORMED_EVENT";

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for all Switchboard errors.
 */
export class SwitchboardError extends Error {
  readonly code: SwitchboardErrorCode;
  readonly details: ErrorDetails;

  constructor(
    code: SwitchboardErrorCode,
    message: string,
    details: ErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SwitchboardError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { name: string; code: SwitchboardErrorCode; message: string; details: ErrorDetails } {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// ============================================================================
// NotFoundError
// ============================================================================

/**
 * Raised when an operation names a conversation that has no live session.
 */
export class NotFoundError extends SwitchboardError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("NOT_FOUND", message, details);
    this.name = "NotFoundError";
  }

  static conversation(conversationId: string): NotFoundError {
    return new NotFoundError(`No active session for conversation "${conversationId}"`, {
      conversationId,
    });
  }

  static noDefault(): NotFoundError {
    return new NotFoundError("No conversation id given and no default session");
  }
}

// ============================================================================
// ConfigurationError
// ============================================================================

/**
 * Raised for invalid setup: duplicate sessions, unsupported engine
 * capabilities, or options that fail validation.
 */
export class ConfigurationError extends SwitchboardError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("CONFIGURATION_ERROR", message, details);
    this.name = "ConfigurationError";
  }

  static duplicateSession(conversationId: string): ConfigurationError {
    return new ConfigurationError(
      `Conversation "${conversationId}" already has a live session; end it first`,
      { conversationId },
    );
  }

  static duplicateConversation(conversationId: string): ConfigurationError {
    return new ConfigurationError(`Conversation "${conversationId}" is already open`, {
      conversationId,
    });
  }

  static unsupported(capability: string): ConfigurationError {
    return new ConfigurationError(`Execution engine does not support ${capability}`, {
      capability,
    });
  }

  static invalid(issues: string[]): ConfigurationError {
    return new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
}

// ============================================================================
// EngineFailure
// ============================================================================

/**
 * Wraps an error thrown by the execution engine mid-turn.
 */
export class EngineFailure extends SwitchboardError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super("ENGINE_FAILURE", message, details, { cause });
    this.name = "EngineFailure";
  }

  static from(error: unknown, conversationId: string): EngineFailure {
    if (isEngineFailure(error)) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new EngineFailure(message, { conversationId }, error);
  }
}

// ============================================================================
// MalformedEventError
// ============================================================================

/**
 * Describes an engine event the dispatcher could not interpret.
 * Built for logging only; dispatch never throws it.
 */
export class MalformedEventError extends SwitchboardError {
  constructor(event: string, reason: string, details: ErrorDetails = {}) {
    super("MALFORMED_EVENT", `Malformed "${event}" event: ${reason}`, { event, ...details });
    this.name = "MalformedEventError";
  }
}

// ============================================================================
// Type guards
// ============================================================================

function hasCode(error: unknown, code: SwitchboardErrorCode): boolean {
  return error instanceof SwitchboardError && error.code === code;
}

export function isSwitchboardError(error: unknown): error is SwitchboardError {
  return error instanceof SwitchboardError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return hasCode(error, "NOT_FOUND");
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return hasCode(error, "CONFIGURATION_ERROR");
}

export function isEngineFailure(error: unknown): error is EngineFailure {
  return hasCode(error, "ENGINE_FAILURE");
}

export function isMalformedEventError(error: unknown): error is MalformedEventError {
  return hasCode(error, "MALFORMED_EVENT");
}

/**
 * Human-readable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

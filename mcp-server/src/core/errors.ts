// src/core/errors.ts
import type { ValidationReason } from "../contracts/directives.js";

export type PracticeErrorType =
  | "validation"
  | "transient_io"
  | "protocol"
  | "configuration"
  | "timeout";

export type RetryAction = "retry_same_action" | "fix_input" | "none";

/**
 * Base error for everything the dispatch boundary knows how to translate.
 * `type` picks the recovery path, `retry_action` tells the caller whether
 * repeating the same action can help.
 */
export class PracticeError extends Error {
  readonly type: PracticeErrorType;
  readonly retry_action: RetryAction;
  readonly meta: Record<string, unknown>;

  constructor(
    type: PracticeErrorType,
    message: string,
    options: { retryAction?: RetryAction; cause?: unknown; meta?: Record<string, unknown> } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.type = type;
    this.retry_action = options.retryAction ?? "none";
    this.meta = options.meta ?? {};
  }
}

/** User input rejected; the flow stays where it is. */
export class ValidationError extends PracticeError {
  readonly reason: ValidationReason;

  constructor(reason: ValidationReason, message: string, meta?: Record<string, unknown>) {
    super("validation", message, { retryAction: "fix_input", meta });
    this.reason = reason;
  }
}

/** Storage, transcription or outbound delivery failed; retrying may succeed. */
export class TransientIOError extends PracticeError {
  constructor(message: string, options: { cause?: unknown; meta?: Record<string, unknown> } = {}) {
    super("transient_io", message, { retryAction: "retry_same_action", ...options });
  }
}

/** An event arrived that the current state does not accept. Logged and ignored. */
export class ProtocolError extends PracticeError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super("protocol", message, { meta });
  }
}

/** Internal inconsistency (bad field index, missing env). The session is reset. */
export class ConfigurationError extends PracticeError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super("configuration", message, { meta });
  }
}

export class LlmTimeoutError extends PracticeError {
  readonly timeout_ms: number;

  constructor(timeoutMs: number, meta?: Record<string, unknown>) {
    super("timeout", `OpenAI request timed out after ${timeoutMs}ms`, {
      retryAction: "retry_same_action",
      meta,
    });
    this.timeout_ms = timeoutMs;
  }
}

export class StorageError extends TransientIOError {}

export function isPracticeError(err: unknown): err is PracticeError {
  return err instanceof PracticeError;
}

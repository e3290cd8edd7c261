/**
 * @fileoverview Error taxonomy shared by every lifecycle operation.
 *
 * Every error carries a safe message (suitable for any audience, used as
 * `Error.message`) and an optional raw message (command output, stack
 * traces) that is only ever written to debug logs.
 *
 * @module Errors
 * @since 1.0.0
 */

/**
 * Kind of failure, used by the transaction to decide what happens next.
 */
export type EngineErrorTag =
  | "validation"
  | "execution"
  | "unrecoverable"
  | "not-implemented"
  | "command"
  | "cancelled";

export class EngineError extends Error {
  readonly messageSafe: string;
  readonly messageRaw: string | undefined;
  readonly tag: EngineErrorTag;

  constructor(tag: EngineErrorTag, messageSafe: string, messageRaw?: string) {
    super(messageSafe);
    this.name = new.target.name;
    this.tag = tag;
    this.messageSafe = messageSafe;
    this.messageRaw = messageRaw;
  }
}

/** A pre-flight check failed; nothing was mutated. */
export class ValidationError extends EngineError {
  constructor(messageSafe: string, messageRaw?: string) {
    super("validation", messageSafe, messageRaw);
  }
}

/** A lifecycle hook or chart install failed after it started mutating state. */
export class ExecutionError extends EngineError {
  constructor(messageSafe: string, messageRaw?: string) {
    super("execution", messageSafe, messageRaw);
  }
}

/** Terminal failure, no further automatic action is taken. */
export class UnrecoverableError extends EngineError {
  constructor(messageSafe: string, messageRaw?: string) {
    super("unrecoverable", messageSafe, messageRaw);
  }
}

/** A capability the service kind does not support was requested. */
export class NotImplementedError extends EngineError {
  constructor(messageSafe: string) {
    super("not-implemented", messageSafe);
  }
}

/** An external process (helm, kubectl) exited with a failure. */
export class CommandError extends EngineError {
  constructor(messageSafe: string, messageRaw?: string) {
    super("command", messageSafe, messageRaw);
  }
}

/** The run was cancelled between two hooks. */
export class CancelledError extends EngineError {
  constructor(messageSafe = "Operation has been cancelled") {
    super("cancelled", messageSafe);
  }
}

/**
 * Wraps anything thrown by a collaborator into an `EngineError`, keeping
 * engine errors untouched.
 *
 * @param err - The caught value
 * @param messageSafe - Safe message to use when `err` is not an engine error
 */
export function toEngineError(err: unknown, messageSafe: string): EngineError {
  if (err instanceof EngineError) {
    return err;
  }
  const raw = err instanceof Error ? (err.stack ?? err.message) : String(err);
  return new ExecutionError(messageSafe, raw);
}

/**
 * Most detailed description of an error, for debug logs and raw messages.
 */
export function rawMessage(err: unknown): string {
  if (err instanceof EngineError) {
    return err.messageRaw ?? err.messageSafe;
  }
  return err instanceof Error ? (err.stack ?? err.message) : String(err);
}

/**
 * Renders an error for logs: safe message, then the raw one when present.
 */
export function describeError(err: unknown): string {
  if (err instanceof EngineError) {
    return err.messageRaw ? `${err.messageSafe} (${err.messageRaw})` : err.messageSafe;
  }
  return err instanceof Error ? err.message : String(err);
}

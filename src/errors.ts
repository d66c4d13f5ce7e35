/**
 * Error taxonomy for the router core.
 *
 * Every failure that can reach the Dispatcher boundary is one of these
 * classes. The `kind` discriminator survives serialization into the
 * uniform error envelope, so callers can branch on it without parsing
 * messages.
 *
 * @module errors
 */

/** Discriminator carried by every {@link SwitchboardError}. */
export type ErrorKind =
  | "NotConfigured"
  | "NotConnected"
  | "HandshakeFailed"
  | "ActionNotFound"
  | "MalformedParameters"
  | "ExecutionFailed"
  | "PersistenceError"
  | "InvalidSet";

/**
 * Base error class for router operations.
 * All core errors extend this class.
 */
export class SwitchboardError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "SwitchboardError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** The server (or Set) name is unknown to the Registry. */
export class NotConfiguredError extends SwitchboardError {
  constructor(public readonly serverName: string) {
    super("NotConfigured", `Server '${serverName}' is not configured`);
    this.name = "NotConfiguredError";
  }
}

/** The server is configured but has no connected session. */
export class NotConnectedError extends SwitchboardError {
  constructor(public readonly serverName: string) {
    super("NotConnected", `Server '${serverName}' is not connected`);
    this.name = "NotConnectedError";
  }
}

/** The connect handshake with an upstream server failed. */
export class HandshakeFailedError extends SwitchboardError {
  constructor(
    public readonly serverName: string,
    cause: unknown,
  ) {
    super(
      "HandshakeFailed",
      `Failed to connect to server '${serverName}': ${describeCause(cause)}`,
      cause,
    );
    this.name = "HandshakeFailedError";
  }
}

/** The action name is absent from the server's tool list. */
export class ActionNotFoundError extends SwitchboardError {
  constructor(
    public readonly serverName: string,
    public readonly actionName: string,
  ) {
    super(
      "ActionNotFound",
      `Action '${actionName}' not found on server '${serverName}'`,
    );
    this.name = "ActionNotFoundError";
  }
}

/** One of the encoded parameter blocks failed to parse. */
export class MalformedParametersError extends SwitchboardError {
  constructor(
    public readonly paramName: string,
    detail: string,
    cause?: unknown,
  ) {
    super("MalformedParameters", `Invalid JSON in ${paramName}: ${detail}`, cause);
    this.name = "MalformedParametersError";
  }
}

/** The remote tool invocation raised. */
export class ExecutionFailedError extends SwitchboardError {
  constructor(
    public readonly serverName: string,
    public readonly actionName: string,
    cause: unknown,
  ) {
    super(
      "ExecutionFailed",
      `Tool '${actionName}' execution failed: ${describeCause(cause)}`,
      cause,
    );
    this.name = "ExecutionFailedError";
  }
}

/** Reading or writing a persisted store failed. */
export class PersistenceError extends SwitchboardError {
  constructor(
    public readonly filePath: string,
    operation: "read" | "write",
    cause: unknown,
  ) {
    super(
      "PersistenceError",
      `Failed to ${operation} ${filePath}: ${describeCause(cause)}`,
      cause,
    );
    this.name = "PersistenceError";
  }
}

/** A Set upsert without a name or without any members. */
export class InvalidSetError extends SwitchboardError {
  constructor(message: string) {
    super("InvalidSet", message);
    this.name = "InvalidSetError";
  }
}

/**
 * Renders an unknown thrown value as a message string.
 */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

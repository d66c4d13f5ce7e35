/**
 * Uniform error envelope returned by every failing meta-tool.
 *
 * @module router/envelope
 */

import {
  ActionNotFoundError,
  type ErrorKind,
  ExecutionFailedError,
  HandshakeFailedError,
  MalformedParametersError,
  NotConfiguredError,
  NotConnectedError,
  SwitchboardError,
} from "../errors.js";

export interface ErrorContext {
  server_name?: string;
  action_name?: string;
  param_name?: string;
  param_value?: string;
  suggestion?: string;
}

export interface ErrorEnvelope extends ErrorContext {
  status: "error";
  error: string;
  /** `Internal` for failures outside the error taxonomy */
  kind: ErrorKind | "Internal";
  traceback?: string;
}

/** Result of a Dispatcher operation */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: ErrorEnvelope };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(error: ErrorEnvelope): Outcome<T> {
  return { ok: false, error };
}

/** Hint telling the caller how to bring a server online */
export function connectSuggestion(serverName: string): string {
  return `Connect first with: manage_servers {"connect": "${serverName}"}`;
}

function contextFor(err: SwitchboardError): ErrorContext {
  if (err instanceof NotConnectedError) {
    return {
      server_name: err.serverName,
      suggestion: connectSuggestion(err.serverName),
    };
  }
  if (err instanceof NotConfiguredError) {
    return {
      server_name: err.serverName,
      suggestion: "Add the server to the registry, or check the name",
    };
  }
  if (err instanceof HandshakeFailedError) {
    return { server_name: err.serverName };
  }
  if (err instanceof ActionNotFoundError) {
    return {
      server_name: err.serverName,
      action_name: err.actionName,
      suggestion: `List actions with: discover_server_actions {"server_names": ["${err.serverName}"]}`,
    };
  }
  if (err instanceof MalformedParametersError) {
    return { param_name: err.paramName };
  }
  if (err instanceof ExecutionFailedError) {
    return {
      server_name: err.serverName,
      action_name: err.actionName,
      suggestion: "Check tool parameters and server logs",
    };
  }
  return {};
}

function tracebackOf(err: unknown): string | undefined {
  if (err instanceof ExecutionFailedError) {
    return err.cause instanceof Error ? err.cause.stack : err.stack;
  }
  if (err instanceof SwitchboardError) {
    return undefined;
  }
  return err instanceof Error ? err.stack : undefined;
}

/**
 * Converts any thrown value into the error envelope. Errors from the
 * taxonomy keep their message and kind; anything else is reported as an
 * internal error with its stack. `extra` fields override derived context.
 *
 * @example
 * ```ts
 * toErrorEnvelope(new NotConnectedError("weather"));
 * // {
 * //   status: "error",
 * //   error: "Server 'weather' is not connected",
 * //   kind: "NotConnected",
 * //   server_name: "weather",
 * //   suggestion: 'Connect first with: manage_servers {"connect": "weather"}',
 * // }
 * ```
 */
export function toErrorEnvelope(
  err: unknown,
  extra: ErrorContext = {},
): ErrorEnvelope {
  const envelope: ErrorEnvelope =
    err instanceof SwitchboardError
      ? {
          status: "error",
          error: err.message,
          kind: err.kind,
          ...contextFor(err),
          ...extra,
        }
      : {
          status: "error",
          error: `Internal error: ${err instanceof Error ? err.message : String(err)}`,
          kind: "Internal",
          ...extra,
        };

  const traceback = tracebackOf(err);
  if (traceback !== undefined) {
    envelope.traceback = traceback;
  }
  return envelope;
}

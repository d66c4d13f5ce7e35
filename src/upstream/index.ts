/**
 * Upstream connection module exports.
 *
 * @module upstream
 */

export {
  type ConnectAck,
  ConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionState,
  type ReportedState,
  type ServerStatus,
} from "./connection-manager.js";
export { SessionClient, type ToolCallResult } from "./session-client.js";
export {
  buildRemoteHeaders,
  createTransport,
  httpStrategy,
  resolveEnvVars,
  sseStrategy,
  stdioStrategy,
  type TransportFactory,
  type TransportStrategy,
} from "./transports.js";

/**
 * Connection manager for upstream MCP servers.
 *
 * Owns at most one live session per server name. Connect is
 * fire-and-forget: the session is registered as `connecting` synchronously
 * and the handshake runs in the background; the live-session map is the
 * single source of truth for completion. Every mutation of that map happens
 * synchronously, so operations on one name never interleave halfway.
 *
 * Per-server state machine:
 *
 * ```
 * absent → connecting → connected → closed
 *              ↓
 *            failed        (failed | closed) → connecting on retry
 * ```
 *
 * No timeout is applied to handshakes or calls.
 *
 * @module upstream/connection-manager
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { HandshakeFailedError, NotConnectedError } from "../errors.js";
import type { ServerDefinition } from "../registry/schema.js";
import { createLogger } from "../utils/logger.js";
import { safelyCloseTransport } from "../utils/transport.js";
import { VERSION } from "../version.js";
import { SessionClient } from "./session-client.js";
import { createTransport, type TransportFactory } from "./transports.js";

const log = createLogger("connections");

/** State of a session in the live registry or the last one seen */
export type ConnectionState = "connecting" | "connected" | "failed" | "closed";

/** Reported state; `absent` for names never connected */
export type ReportedState = ConnectionState | "absent";

/** Acknowledgement returned by a non-blocking connect */
export interface ConnectAck {
  server: string;
  state: ConnectionState;
  /** false when a session was already connecting or connected */
  initiated: boolean;
}

export interface ServerStatus {
  state: ReportedState;
  error: string | undefined;
}

export interface ConnectionManagerOptions {
  /** Builds transports; tests inject in-memory ones */
  transportFactory?: TransportFactory;
  /** Client identity sent in the handshake */
  clientInfo?: { name: string; version: string };
}

interface LiveSession {
  readonly serverName: string;
  state: "connecting" | "connected";
  readonly client: Client;
  transport: Transport | null;
  readonly handle: SessionClient;
  /** Settles when the handshake finishes */
  readonly ready: Promise<SessionClient>;
  /** Set once a local close has begun, so close events are not remote */
  closing: boolean;
}

interface TerminalOutcome {
  state: "failed" | "closed";
  error: string | undefined;
}

/**
 * @example
 * ```ts
 * const connections = new ConnectionManager();
 * connections.connect(registry.getServer("weather"));
 * // later
 * const client = connections.getClient("weather");
 * await client.callTool("get_forecast", { city: "Boston" });
 * ```
 */
export class ConnectionManager {
  private readonly live = new Map<string, LiveSession>();
  private readonly outcomes = new Map<string, TerminalOutcome>();
  private readonly transportFactory: TransportFactory;
  private readonly clientInfo: { name: string; version: string };

  constructor(options: ConnectionManagerOptions = {}) {
    this.transportFactory = options.transportFactory ?? createTransport;
    this.clientInfo = options.clientInfo ?? {
      name: "mcp-switchboard",
      version: VERSION,
    };
  }

  /**
   * Starts connecting in the background and returns immediately. A server
   * already connecting or connected is left alone.
   */
  connect(server: ServerDefinition): ConnectAck {
    const existing = this.live.get(server.name);
    if (existing) {
      return { server: server.name, state: existing.state, initiated: false };
    }
    const session = this.start(server);
    // The background handshake logs its own failure.
    session.ready.catch(() => undefined);
    return { server: server.name, state: "connecting", initiated: true };
  }

  /**
   * Connects (or joins an in-flight connect) and waits for the handshake.
   *
   * @throws HandshakeFailedError if the handshake fails
   */
  connectAndWait(server: ServerDefinition): Promise<SessionClient> {
    const session = this.live.get(server.name) ?? this.start(server);
    return session.ready;
  }

  /**
   * Closes a server's session. A session still connecting is awaited, never
   * aborted, then closed. No session is a no-op.
   *
   * @returns true if a session was closed by this call
   */
  async disconnect(serverName: string): Promise<boolean> {
    const session = this.live.get(serverName);
    if (!session) {
      return false;
    }

    if (session.state === "connecting") {
      try {
        await session.ready;
      } catch (err) {
        log.debug(
          `${serverName} failed while connecting, nothing to close: ${String(err)}`,
        );
        return false;
      }
    }

    // Another disconnect or a remote close may have won while we waited.
    if (this.live.get(serverName) !== session) {
      return false;
    }

    session.closing = true;
    this.live.delete(serverName);
    this.outcomes.set(serverName, { state: "closed", error: undefined });
    if (session.transport) {
      await safelyCloseTransport(session.transport);
    }
    log.info(`Disconnected from ${serverName}`);
    return true;
  }

  /**
   * Closes every live session. Individual failures are logged and do not
   * stop the rest.
   *
   * @returns Names of the sessions closed
   */
  async disconnectAll(): Promise<string[]> {
    const names = this.listActive();
    const results = await Promise.allSettled(
      names.map((name) => this.disconnect(name)),
    );

    const closed: string[] = [];
    results.forEach((result, index) => {
      const name = names[index] ?? "";
      if (result.status === "fulfilled") {
        if (result.value) closed.push(name);
      } else {
        log.warn(`Failed to disconnect ${name}`, result.reason);
      }
    });
    return closed;
  }

  /**
   * @throws NotConnectedError when there is no connected session
   */
  getClient(serverName: string): SessionClient {
    const session = this.live.get(serverName);
    if (!session || session.state !== "connected") {
      throw new NotConnectedError(serverName);
    }
    return session.handle;
  }

  /** Names currently connecting or connected */
  listActive(): string[] {
    return Array.from(this.live.keys());
  }

  /** Connecting or connected */
  isLive(serverName: string): boolean {
    return this.live.has(serverName);
  }

  isConnected(serverName: string): boolean {
    return this.live.get(serverName)?.state === "connected";
  }

  getState(serverName: string): ReportedState {
    return (
      this.live.get(serverName)?.state ??
      this.outcomes.get(serverName)?.state ??
      "absent"
    );
  }

  /** Live state, or last terminal state and error, per server seen */
  getStatus(): Map<string, ServerStatus> {
    const status = new Map<string, ServerStatus>();
    for (const [name, outcome] of this.outcomes) {
      status.set(name, { state: outcome.state, error: outcome.error });
    }
    for (const [name, session] of this.live) {
      status.set(name, { state: session.state, error: undefined });
    }
    return status;
  }

  private start(server: ServerDefinition): LiveSession {
    const client = new Client(this.clientInfo);
    const session: LiveSession = {
      serverName: server.name,
      state: "connecting",
      client,
      transport: null,
      handle: new SessionClient(server.name, client, () =>
        this.live.get(server.name) === session && session.state === "connected",
      ),
      ready: Promise.resolve().then(() => this.handshake(session, server)),
      closing: false,
    };
    client.onclose = () => this.handleRemoteClose(session);

    this.live.set(server.name, session);
    this.outcomes.delete(server.name);
    log.info(`Connecting to ${server.name} (${server.transport})`);
    return session;
  }

  private async handshake(
    session: LiveSession,
    server: ServerDefinition,
  ): Promise<SessionClient> {
    try {
      const transport = this.transportFactory(server);
      session.transport = transport;
      await session.client.connect(transport);
    } catch (err) {
      const error = new HandshakeFailedError(server.name, err);
      log.error(error.message);
      session.closing = true;
      this.settle(session, { state: "failed", error: error.message });
      if (session.transport) {
        await safelyCloseTransport(session.transport);
      }
      throw error;
    }

    session.state = "connected";
    log.info(`Connected to ${server.name}`);
    return session.handle;
  }

  /** Subprocess exit or stream end, not initiated by us */
  private handleRemoteClose(session: LiveSession): void {
    // A close during the handshake rejects it; the handshake settles that.
    if (session.closing || session.state === "connecting") return;
    session.closing = true;
    log.warn(`${session.serverName} closed the connection`);
    this.settle(session, { state: "closed", error: "connection closed by server" });
  }

  private settle(session: LiveSession, outcome: TerminalOutcome): void {
    if (this.live.get(session.serverName) !== session) return;
    this.live.delete(session.serverName);
    this.outcomes.set(session.serverName, outcome);
  }
}

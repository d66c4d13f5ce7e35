/**
 * One transport strategy per server transport kind.
 *
 * @module upstream/transports
 */

import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type {
  HttpServerDefinition,
  RemoteServerDefinition,
  ServerDefinition,
  SseServerDefinition,
  StdioServerDefinition,
} from "../registry/schema.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("transport");

/** Builds the (unstarted) transport for a server definition */
export type TransportFactory = (server: ServerDefinition) => Transport;

export interface TransportStrategy<D extends ServerDefinition> {
  readonly kind: D["transport"];
  create(server: D): Transport;
}

/**
 * Resolves `$VAR` references against `scope`, then the process environment.
 * Unset variables resolve to the empty string.
 *
 * @example
 * ```ts
 * resolveEnvVars({ API_KEY: "$WEATHER_KEY", MODE: "fast" });
 * // { API_KEY: process.env.WEATHER_KEY ?? "", MODE: "fast" }
 * ```
 */
export function resolveEnvVars(
  values: Record<string, string>,
  scope: Record<string, string> = {},
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value.startsWith("$")) {
      const envKey = value.slice(1);
      resolved[key] = scope[envKey] ?? process.env[envKey] ?? "";
    } else {
      resolved[key] = value;
    }
  }
  return resolved;
}

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

/**
 * Headers sent to a remote server: configured headers with `$VAR`
 * resolution, plus `Authorization: Bearer <auth>` when an auth token is set
 * and no Authorization header is configured.
 */
export function buildRemoteHeaders(
  server: RemoteServerDefinition,
): Record<string, string> {
  const headers = resolveEnvVars(server.headers, resolveEnvVars(server.env));
  const hasAuthorization = Object.keys(headers).some(
    (key) => key.toLowerCase() === "authorization",
  );
  if (server.auth && !hasAuthorization) {
    headers["Authorization"] = `Bearer ${server.auth}`;
  }
  return headers;
}

export const stdioStrategy: TransportStrategy<StdioServerDefinition> = {
  kind: "stdio",
  create(server) {
    const transport = new StdioClientTransport({
      command: server.command,
      args: server.args,
      env: { ...inheritedEnv(), ...resolveEnvVars(server.env) },
      stderr: "pipe",
    });
    // Drain the child's stderr so it never blocks on a full pipe.
    transport.stderr?.on("data", (chunk: unknown) => {
      log.debug(`${server.name} stderr: ${String(chunk).trimEnd()}`);
    });
    return transport;
  },
};

export const sseStrategy: TransportStrategy<SseServerDefinition> = {
  kind: "sse",
  create(server) {
    const headers = buildRemoteHeaders(server);
    const fetchWithHeaders: typeof fetch = async (input, init) => {
      const merged = new Headers(init?.headers);
      for (const [key, value] of Object.entries(headers)) {
        merged.set(key, value);
      }
      return fetch(input, { ...init, headers: merged });
    };
    return new SSEClientTransport(new URL(server.url), {
      eventSourceInit: { fetch: fetchWithHeaders },
      requestInit: { headers },
      fetch: fetchWithHeaders,
    });
  },
};

export const httpStrategy: TransportStrategy<HttpServerDefinition> = {
  kind: "http",
  create(server) {
    return new StreamableHTTPClientTransport(new URL(server.url), {
      requestInit: { headers: buildRemoteHeaders(server) },
    });
  },
};

/** Default factory: dispatches on the definition's transport kind */
export const createTransport: TransportFactory = (server) => {
  switch (server.transport) {
    case "stdio":
      return stdioStrategy.create(server);
    case "sse":
      return sseStrategy.create(server);
    case "http":
      return httpStrategy.create(server);
  }
};

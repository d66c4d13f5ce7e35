/**
 * Meta-tool dispatcher.
 *
 * Routes every meta-tool to the registry, the catalog and the connection
 * manager. Holds no state of its own. Every failure is caught here and
 * returned as an {@link ErrorEnvelope}; nothing thrown by a store or an
 * upstream server escapes.
 *
 * @module router/dispatcher
 */

import { ToolSearcher } from "../catalog/search.js";
import type { ToolCatalog } from "../catalog/store.js";
import type { SearchHit, ToolDescriptor } from "../catalog/types.js";
import { DEFAULT_SETTINGS } from "../config/schema.js";
import {
  ActionNotFoundError,
  describeCause,
  MalformedParametersError,
  NotConfiguredError,
  NotConnectedError,
} from "../errors.js";
import type { ServerRegistry } from "../registry/registry.js";
import type { ServerDefinition } from "../registry/schema.js";
import type { ConnectionManager } from "../upstream/connection-manager.js";
import type {
  SessionClient,
  ToolCallResult,
} from "../upstream/session-client.js";
import { createLogger } from "../utils/logger.js";
import {
  type ErrorEnvelope,
  failure,
  type Outcome,
  success,
  toErrorEnvelope,
} from "./envelope.js";

const log = createLogger("dispatcher");

/** Cap on live matches per server in discovery */
const DISCOVER_MAX_PER_SERVER = 50;
const DOCS_DEFAULT_RESULTS = 10;
const DOCS_MAX_RESULTS = 50;
/** Longest parameter text echoed back in an error */
const PARAM_ECHO_LENGTH = 100;

export interface SearchLimits {
  defaultMaxResults: number;
  maxResults: number;
}

export interface DispatcherOptions {
  registry: ServerRegistry;
  catalog: ToolCatalog;
  connections: ConnectionManager;
  search?: SearchLimits;
}

export interface ExecuteRequest {
  server_name: string;
  action_name: string;
  path_params?: string | undefined;
  query_params?: string | undefined;
  body_schema?: string | undefined;
}

export interface UpsertSetRequest {
  name: string;
  servers?: string[] | undefined;
  description?: string | undefined;
  include_sets?: string[] | undefined;
}

/**
 * Every field is optional; each one present runs, in declaration order.
 */
export interface ManageRequest {
  list_configured_mcps?: boolean | undefined;
  list_sets?: boolean | undefined;
  search_sets?: string | undefined;
  upsert_set?: UpsertSetRequest | undefined;
  delete_set?: string | undefined;
  connect?: string | undefined;
  connect_set?: string | undefined;
  connect_set_exclusive?: boolean | undefined;
  disconnect?: string | undefined;
  disconnect_set?: string | undefined;
  disconnect_all?: boolean | undefined;
  populate_catalog?: boolean | undefined;
}

/** Per-server discovery result: the tools, or why there are none */
export type DiscoveryResult = Record<string, ToolDescriptor[] | ErrorEnvelope>;

export type ServerStatusLabel = "online" | "offline";

export interface CatalogToolHit extends SearchHit {
  current_status: ServerStatusLabel;
}

export interface CollectionHit {
  type: "collection";
  name: string;
  description: string;
  servers: string[];
  include_sets: string[];
  status: "available";
}

export interface CatalogSearchResult {
  collections: CollectionHit[];
  tools: CatalogToolHit[];
}

export type AuthIntention = "get_auth_url" | "save_auth_data";

export type AuthResult =
  | {
      server: string;
      message: string;
      instructions: string;
      required_fields: Record<string, string>;
    }
  | { server: string; status: "success"; message: string };

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(Math.trunc(value), min), max);
}

function truncate(text: string, length: number): string {
  return text.length > length ? text.slice(0, length) : text;
}

/**
 * Parses one encoded parameter block. Empty text and `"{}"` contribute
 * nothing.
 *
 * @throws MalformedParametersError naming the block
 */
export function parseParamBlock(
  paramName: string,
  text: string | undefined,
): Record<string, unknown> | undefined {
  if (text === undefined || text.trim() === "" || text.trim() === "{}") {
    return undefined;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    throw new MalformedParametersError(paramName, describeCause(err), err);
  }
  if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
    throw new MalformedParametersError(paramName, "expected a JSON object");
  }
  return Object.fromEntries(Object.entries(decoded));
}

/**
 * @example
 * ```ts
 * const dispatcher = new Dispatcher({ registry, catalog, connections });
 * await dispatcher.manage({ connect: "weather" }); // "weather starting"
 * await dispatcher.execute({
 *   server_name: "weather",
 *   action_name: "get_forecast",
 *   query_params: '{"city":"Boston"}',
 * });
 * ```
 */
export class Dispatcher {
  private readonly registry: ServerRegistry;
  private readonly catalog: ToolCatalog;
  private readonly connections: ConnectionManager;
  private readonly limits: SearchLimits;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.catalog = options.catalog;
    this.connections = options.connections;
    this.limits = options.search ?? DEFAULT_SETTINGS.operations.search;
  }

  /**
   * Resolves a connected session, telling an unknown server apart from a
   * known one that is offline.
   */
  private requireClient(serverName: string): SessionClient {
    if (this.connections.isConnected(serverName)) {
      return this.connections.getClient(serverName);
    }
    if (!this.registry.hasServer(serverName)) {
      throw new NotConfiguredError(serverName);
    }
    throw new NotConnectedError(serverName);
  }

  /** Lists a server's live tools and refreshes its catalog entry */
  private async listLive(serverName: string): Promise<ToolDescriptor[]> {
    const tools = await this.requireClient(serverName).listTools();
    await this.catalog.updateServer(serverName, tools);
    return tools;
  }

  // --- discover_server_actions ---

  /**
   * Lists live tools per server, filtered by `userQuery` when given.
   * Defaults to every connected server. Per-server failures are embedded.
   */
  async discover(
    userQuery?: string,
    serverNames?: string[],
  ): Promise<DiscoveryResult> {
    const names =
      serverNames && serverNames.length > 0
        ? serverNames
        : this.connections
            .listActive()
            .filter((name) => this.connections.isConnected(name));

    const result: DiscoveryResult = {};
    for (const serverName of names) {
      try {
        const tools = await this.listLive(serverName);
        result[serverName] =
          userQuery && userQuery.trim() !== ""
            ? this.filterLive(serverName, tools, userQuery)
            : tools;
      } catch (err) {
        log.warn(`Discovery failed for ${serverName}`, err);
        result[serverName] = toErrorEnvelope(err);
      }
    }
    return result;
  }

  private filterLive(
    serverName: string,
    tools: ToolDescriptor[],
    query: string,
  ): ToolDescriptor[] {
    const hits = new ToolSearcher({ [serverName]: tools }, "live").search(
      query,
      DISCOVER_MAX_PER_SERVER,
    );
    const byName = new Map(tools.map((tool) => [tool.name, tool]));
    const filtered: ToolDescriptor[] = [];
    for (const hit of hits) {
      const tool = byName.get(hit.name);
      if (tool) filtered.push(tool);
    }
    return filtered;
  }

  // --- get_action_details ---

  async getActionDetails(
    serverName: string,
    actionName: string,
  ): Promise<Outcome<ToolDescriptor>> {
    try {
      const tools = await this.listLive(serverName);
      const tool = tools.find((t) => t.name === actionName);
      if (!tool) {
        throw new ActionNotFoundError(serverName, actionName);
      }
      return success({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      });
    } catch (err) {
      return failure(toErrorEnvelope(err));
    }
  }

  // --- execute_action ---

  /**
   * Parses the parameter blocks, then calls the tool on an already
   * connected session. Never connects implicitly.
   */
  async execute(request: ExecuteRequest): Promise<Outcome<ToolCallResult>> {
    const { server_name: serverName, action_name: actionName } = request;

    // Parameter blocks are checked before the session, so a malformed block
    // is reported even for an offline server.
    const params: Record<string, unknown> = {};
    const blocks: Array<[string, string | undefined]> = [
      ["path_params", request.path_params],
      ["query_params", request.query_params],
      ["body_schema", request.body_schema],
    ];
    for (const [paramName, text] of blocks) {
      try {
        Object.assign(params, parseParamBlock(paramName, text));
      } catch (err) {
        return failure(
          toErrorEnvelope(err, {
            server_name: serverName,
            action_name: actionName,
            param_value: truncate(text ?? "", PARAM_ECHO_LENGTH),
          }),
        );
      }
    }

    let client: SessionClient;
    try {
      client = this.requireClient(serverName);
    } catch (err) {
      return failure(toErrorEnvelope(err));
    }

    try {
      return success(await client.callTool(actionName, params));
    } catch (err) {
      log.error(`Tool ${serverName}/${actionName} failed`, err);
      return failure(
        toErrorEnvelope(err, {
          server_name: serverName,
          action_name: actionName,
        }),
      );
    }
  }

  // --- manage_servers ---

  /**
   * Runs every requested management operation and joins their textual
   * results with newlines. One failing operation does not stop the rest.
   */
  async manage(request: ManageRequest): Promise<string> {
    const steps: Array<[boolean, () => string | Promise<string>]> = [
      [request.list_configured_mcps === true, () => this.listConfigured()],
      [request.list_sets === true, () => this.listSetsText()],
      [
        Boolean(request.search_sets),
        () => this.searchSets(request.search_sets ?? ""),
      ],
      [
        request.upsert_set !== undefined,
        () => this.upsertSet(request.upsert_set),
      ],
      [
        Boolean(request.delete_set),
        () => this.deleteSet(request.delete_set ?? ""),
      ],
      [Boolean(request.connect), () => this.connectOne(request.connect ?? "")],
      [
        Boolean(request.connect_set),
        () =>
          this.connectSet(
            request.connect_set ?? "",
            request.connect_set_exclusive === true,
          ),
      ],
      [
        Boolean(request.disconnect),
        () => this.disconnectOne(request.disconnect ?? ""),
      ],
      [
        Boolean(request.disconnect_set),
        () => this.disconnectSet(request.disconnect_set ?? ""),
      ],
      [request.disconnect_all === true, () => this.disconnectAll()],
      [request.populate_catalog === true, () => this.populateCatalog()],
    ];

    const results: string[] = [];
    for (const [requested, run] of steps) {
      if (!requested) continue;
      try {
        results.push(await run());
      } catch (err) {
        log.warn("manage_servers operation failed", err);
        results.push(`error: ${describeCause(err)}`);
      }
    }
    return results.length > 0 ? results.join("\n") : "no operation requested";
  }

  private listConfigured(): string {
    const servers = this.registry.listServers();
    if (servers.length === 0) {
      return "No servers configured";
    }
    return servers
      .map((server) => {
        const state = this.connections.getState(server.name);
        const label =
          state === "connected" ? "on" : state === "connecting" ? "starting" : "off";
        return `${server.name}, ${label}`;
      })
      .join("\n");
  }

  private listSetsText(): string {
    const sets = this.registry.listSets();
    if (sets.length === 0) {
      return "No sets configured";
    }
    return sets
      .map((set) => {
        let line = set.description ? `${set.name}: ${set.description}` : `${set.name}:`;
        if (set.servers.length > 0) {
          line += `\n  servers: ${set.servers.join(", ")}`;
        }
        if (set.includeSets.length > 0) {
          line += `\n  includes: ${set.includeSets.join(", ")}`;
        }
        return line;
      })
      .join("\n");
  }

  private searchSets(query: string): string {
    const needle = query.toLowerCase();
    const matches = this.registry
      .listSets()
      .filter(
        (set) =>
          set.name.toLowerCase().includes(needle) ||
          set.description.toLowerCase().includes(needle),
      )
      .map((set) => {
        const servers = set.servers.join(", ");
        return set.description
          ? `${set.name}: ${set.description}\n  ${servers}`
          : `${set.name}:\n  ${servers}`;
      });
    return matches.length > 0 ? matches.join("\n") : `no sets matching '${query}'`;
  }

  private upsertSet(request: UpsertSetRequest | undefined): string {
    if (!request) {
      return "error: missing name, or need servers or include_sets";
    }
    this.registry.upsertSet(
      request.name,
      request.servers ?? [],
      request.description ?? "",
      request.include_sets,
    );
    return `set '${request.name}' saved`;
  }

  private deleteSet(name: string): string {
    return this.registry.removeSet(name)
      ? `set '${name}' deleted`
      : `error: set '${name}' not found`;
  }

  private connectOne(name: string): string {
    const server = this.registry.getServer(name);
    if (!server) {
      return `error: ${name} not configured`;
    }
    const ack = this.connections.connect(server);
    return ack.state === "connected" ? `${name} on` : `${name} starting`;
  }

  private async connectSet(setName: string, exclusive: boolean): Promise<string> {
    const members = this.registry.getSet(setName);
    if (members === undefined) {
      return `error: set '${setName}' not found`;
    }

    const stopped: string[] = [];
    if (exclusive) {
      const outside = this.connections
        .listActive()
        .filter((name) => !members.includes(name));
      await Promise.all(outside.map((name) => this.connections.disconnect(name)));
      stopped.push(...outside);
    }

    const statuses = members.map((name) => {
      const server = this.registry.getServer(name);
      if (this.connections.isLive(name)) {
        return `${name}: on`;
      }
      if (!server) {
        return `${name}: not configured`;
      }
      this.connections.connect(server);
      return `${name}: starting`;
    });

    const prefix = exclusive
      ? `connect_set '${setName}' (exclusive):`
      : `connect_set '${setName}':`;
    let output = [prefix, ...statuses].join("\n");
    if (stopped.length > 0) {
      output += `\nstopped: ${stopped.join(", ")}`;
    }
    return output;
  }

  private async disconnectOne(name: string): Promise<string> {
    await this.connections.disconnect(name);
    return `${name} off`;
  }

  private async disconnectSet(setName: string): Promise<string> {
    const members = this.registry.getSet(setName);
    if (members === undefined) {
      return `error: set '${setName}' not found`;
    }
    const results = await Promise.allSettled(
      members.map((name) => this.connections.disconnect(name)),
    );
    let stopped = 0;
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        if (result.value) stopped += 1;
      } else {
        log.warn(`Failed to disconnect ${members[index] ?? "?"}`, result.reason);
      }
    });
    return `disconnect_set '${setName}': ${stopped} stopped`;
  }

  private async disconnectAll(): Promise<string> {
    await this.connections.disconnectAll();
    return "all disconnected";
  }

  /**
   * Indexes every enabled server without a catalog entry, concurrently.
   * Servers not live beforehand are connected for the listing and closed
   * afterwards; sessions already live are left open.
   */
  async populateCatalog(): Promise<string> {
    const enabled = this.registry.listServers(true);
    const cached = enabled.filter((server) => this.catalog.hasTools(server.name));
    const pending = enabled.filter((server) => !this.catalog.hasTools(server.name));

    if (pending.length === 0) {
      return `catalog: ${cached.length}/${enabled.length} cached, nothing to populate`;
    }

    const lines = await Promise.all(
      pending.map((server) => this.populateOne(server)),
    );
    return [
      `catalog: indexed ${pending.length}, skipped ${cached.length}`,
      ...lines,
    ].join("\n");
  }

  private async populateOne(server: ServerDefinition): Promise<string> {
    const wasLive = this.connections.isLive(server.name);
    try {
      const client = await this.connections.connectAndWait(server);
      const tools = await client.listTools();
      await this.catalog.updateServer(server.name, tools);
      return `${server.name}: ${tools.length} tools`;
    } catch (err) {
      log.warn(`Catalog population failed for ${server.name}`, err);
      return `${server.name}: error - ${describeCause(err)}`;
    } finally {
      if (!wasLive) {
        await this.connections.disconnect(server.name);
      }
    }
  }

  // --- search_mcp_catalog ---

  /**
   * Offline catalog search with each hit's server status, plus Sets whose
   * name or description contains the query.
   */
  searchCatalog(query: string, maxResults?: number): CatalogSearchResult {
    const limit = clamp(
      maxResults ?? this.limits.defaultMaxResults,
      1,
      this.limits.maxResults,
    );
    const tools = this.catalog.search(query, limit).map(
      (hit): CatalogToolHit => ({
        ...hit,
        current_status: this.connections.isConnected(hit.category_name)
          ? "online"
          : "offline",
      }),
    );

    const needle = query.trim().toLowerCase();
    const sets = needle.length > 0 ? this.registry.listSets() : [];
    const collections = sets
      .filter(
        (set) =>
          set.name.toLowerCase().includes(needle) ||
          set.description.toLowerCase().includes(needle),
      )
      .map(
        (set): CollectionHit => ({
          type: "collection",
          name: set.name,
          description: set.description,
          servers: set.servers,
          include_sets: set.includeSets,
          status: "available",
        }),
      );

    return { collections, tools };
  }

  // --- handle_auth_failure ---

  /**
   * Authentication handshake stub. Nothing is persisted.
   */
  handleAuth(
    serverName: string,
    intention: AuthIntention,
    authData?: Record<string, unknown>,
  ): Outcome<AuthResult> {
    if (intention === "get_auth_url") {
      return success({
        server: serverName,
        message: `Authentication required for server '${serverName}'`,
        instructions: "Please provide authentication credentials",
        required_fields: { token: "Authentication token or API key" },
      });
    }

    if (!authData || Object.keys(authData).length === 0) {
      return failure({
        status: "error",
        error: "auth_data is required when intention is 'save_auth_data'",
        kind: "MalformedParameters",
        server_name: serverName,
        param_name: "auth_data",
      });
    }
    return success({
      server: serverName,
      status: "success",
      message: `Authentication data saved for server '${serverName}'`,
    });
  }

  // --- search_documentation ---

  /**
   * Live search over one connected server's tools.
   */
  async searchDocumentation(
    query: string,
    serverName: string,
    maxResults = DOCS_DEFAULT_RESULTS,
  ): Promise<Outcome<SearchHit[]>> {
    try {
      const tools = await this.listLive(serverName);
      const limit = clamp(maxResults, 1, DOCS_MAX_RESULTS);
      return success(
        new ToolSearcher({ [serverName]: tools }, "live").search(query, limit),
      );
    } catch (err) {
      return failure(toErrorEnvelope(err));
    }
  }
}

/**
 * Switchboard server module - the MCP surface the calling agent talks to.
 *
 * Exposes seven meta-tools instead of every upstream tool schema:
 * - discover_server_actions: live tool listing per connected server
 * - get_action_details: one tool's full schema
 * - execute_action: call a tool on a connected server
 * - manage_servers: connections, Sets and catalog population
 * - search_mcp_catalog: offline catalog search plus matching Sets
 * - handle_auth_failure: authentication handshake stub
 * - search_documentation: live search within one server
 *
 * @module server
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ToolCatalog } from "../catalog/store.js";
import { DEFAULT_SETTINGS, type SwitchboardSettings } from "../config/schema.js";
import type { ServerDefinition } from "../registry/schema.js";
import type { RegistryWatcher, ServerRegistry } from "../registry/registry.js";
import { Dispatcher } from "../router/dispatcher.js";
import {
  type ErrorEnvelope,
  type Outcome,
  toErrorEnvelope,
} from "../router/envelope.js";
import type { ConnectionManager } from "../upstream/connection-manager.js";
import { createLogger } from "../utils/logger.js";
import { VERSION } from "../version.js";

const log = createLogger("server");

/**
 * Configuration options for creating a switchboard server instance.
 */
export interface SwitchboardServerOptions {
  registry: ServerRegistry;
  catalog: ToolCatalog;
  connections: ConnectionManager;
  settings?: SwitchboardSettings;
  /** Server name reported to clients (default: "mcp-switchboard") */
  name?: string;
  /** Server version reported to clients (default: package version) */
  version?: string;
}

function textResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text" as const,
        text: typeof value === "string" ? value : JSON.stringify(value),
      },
    ],
  };
}

function errorResult(envelope: ErrorEnvelope): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
    isError: true,
  };
}

function outcomeResult<T>(outcome: Outcome<T>): CallToolResult {
  return outcome.ok ? textResult(outcome.value) : errorResult(outcome.error);
}

/**
 * Any failure that slips past the dispatcher still reaches the agent as an
 * error envelope instead of a protocol error.
 */
async function respond(
  toolName: string,
  run: () => CallToolResult | Promise<CallToolResult>,
): Promise<CallToolResult> {
  try {
    return await run();
  } catch (err) {
    log.error(`${toolName} failed unexpectedly`, err);
    return errorResult(toErrorEnvelope(err));
  }
}

/**
 * The router's MCP server.
 *
 * @example
 * ```ts
 * const server = new SwitchboardServer({ registry, catalog, connections, settings });
 * await server.start();
 * ```
 */
export class SwitchboardServer {
  readonly dispatcher: Dispatcher;
  private readonly mcpServer: McpServer;
  private readonly registry: ServerRegistry;
  private readonly catalog: ToolCatalog;
  private readonly connections: ConnectionManager;
  private readonly settings: SwitchboardSettings;
  private readonly serverName: string;
  private readonly serverVersion: string;
  private transport: StdioServerTransport | null = null;
  private watcher: RegistryWatcher | null = null;

  constructor(options: SwitchboardServerOptions) {
    this.registry = options.registry;
    this.catalog = options.catalog;
    this.connections = options.connections;
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.serverName = options.name ?? "mcp-switchboard";
    this.serverVersion = options.version ?? VERSION;

    this.dispatcher = new Dispatcher({
      registry: this.registry,
      catalog: this.catalog,
      connections: this.connections,
      search: this.settings.operations.search,
    });

    this.mcpServer = this.createMcpServer();
    this.registerMetaTools(this.mcpServer);
  }

  private createMcpServer(): McpServer {
    return new McpServer(
      { name: this.serverName, version: this.serverVersion },
      { capabilities: { tools: {} } },
    );
  }

  /**
   * Creates another MCP server bound to the same dispatcher, for transports
   * other than the process's own stdio (tests use in-memory pairs).
   */
  createSessionServer(): McpServer {
    const server = this.createMcpServer();
    this.registerMetaTools(server);
    return server;
  }

  private registerMetaTools(server: McpServer): void {
    const search = this.settings.operations.search;

    server.registerTool(
      "discover_server_actions",
      {
        description:
          "PREFERRED STARTING POINT: list the actions of connected servers, filtered by a natural-language query. Defaults to every connected server.",
        inputSchema: {
          user_query: z
            .string()
            .optional()
            .describe("Natural language query used to filter actions"),
          server_names: z
            .array(z.string())
            .optional()
            .describe("Servers to discover actions from"),
        },
      },
      async (args) =>
        respond("discover_server_actions", async () =>
          textResult(
            await this.dispatcher.discover(args.user_query, args.server_names),
          ),
        ),
    );

    server.registerTool(
      "get_action_details",
      {
        description:
          "Get the description and input schema of one action on a connected server.",
        inputSchema: {
          server_name: z.string().describe("The name of the server"),
          action_name: z.string().describe("The name of the action"),
        },
      },
      async (args) =>
        respond("get_action_details", async () =>
          outcomeResult(
            await this.dispatcher.getActionDetails(
              args.server_name,
              args.action_name,
            ),
          ),
        ),
    );

    server.registerTool(
      "execute_action",
      {
        description:
          "Execute an action on a connected server. Parameters are JSON object strings merged in order path, query, body. Connect the server first with manage_servers.",
        inputSchema: {
          server_name: z.string().describe("The name of the server"),
          action_name: z.string().describe("The name of the action to execute"),
          path_params: z
            .string()
            .optional()
            .describe("JSON string containing path parameters"),
          query_params: z
            .string()
            .optional()
            .describe("JSON string containing query parameters"),
          body_schema: z
            .string()
            .optional()
            .describe("JSON string containing the request body"),
        },
      },
      async (args) =>
        respond("execute_action", async () => {
          const outcome = await this.dispatcher.execute(args);
          return outcome.ok ? outcome.value : errorResult(outcome.error);
        }),
    );

    server.registerTool(
      "manage_servers",
      {
        description:
          "Manage server connections and Sets. Every field given runs, in order: list, search and edit Sets, connect, disconnect, populate the catalog.",
        inputSchema: {
          list_configured_mcps: z
            .boolean()
            .optional()
            .describe("List every configured server with its status"),
          list_sets: z
            .boolean()
            .optional()
            .describe("List every Set with its servers"),
          search_sets: z
            .string()
            .optional()
            .describe("Find Sets whose name or description contains this"),
          upsert_set: z
            .object({
              name: z.string(),
              servers: z.array(z.string()).optional(),
              description: z.string().optional(),
              include_sets: z
                .array(z.string())
                .optional()
                .describe("Other Sets to include"),
            })
            .optional()
            .describe("Create or update a Set"),
          delete_set: z.string().optional().describe("Set to delete"),
          connect: z.string().optional().describe("Server to connect"),
          connect_set: z
            .string()
            .optional()
            .describe("Set whose servers to connect"),
          connect_set_exclusive: z
            .boolean()
            .optional()
            .describe("With connect_set, disconnect every other server first"),
          disconnect: z.string().optional().describe("Server to disconnect"),
          disconnect_set: z
            .string()
            .optional()
            .describe("Set whose servers to disconnect"),
          disconnect_all: z
            .boolean()
            .optional()
            .describe("Disconnect every server"),
          populate_catalog: z
            .boolean()
            .optional()
            .describe(
              "Index every enabled server missing from the catalog, connecting temporarily where needed",
            ),
        },
      },
      async (args) =>
        respond("manage_servers", async () =>
          textResult(await this.dispatcher.manage(args)),
        ),
    );

    server.registerTool(
      "search_mcp_catalog",
      {
        description:
          "Search the offline tool catalog, and find Sets matching the query. Works without any live connection.",
        inputSchema: {
          query: z.string().describe("Search query for tools or collections"),
          max_results: z
            .number()
            .int()
            .min(1)
            .max(search.maxResults)
            .optional()
            .describe(
              `Maximum tools to return (default: ${search.defaultMaxResults})`,
            ),
        },
      },
      async (args) =>
        respond("search_mcp_catalog", () =>
          textResult(
            this.dispatcher.searchCatalog(args.query, args.max_results),
          ),
        ),
    );

    server.registerTool(
      "handle_auth_failure",
      {
        description:
          "Handle an authentication failure: get instructions, or hand over credentials.",
        inputSchema: {
          server_name: z.string().describe("The name of the server"),
          intention: z
            .enum(["get_auth_url", "save_auth_data"])
            .describe("What to do"),
          auth_data: z
            .record(z.string(), z.unknown())
            .optional()
            .describe("Authentication data when saving"),
        },
      },
      async (args) =>
        respond("handle_auth_failure", () =>
          outcomeResult(
            this.dispatcher.handleAuth(
              args.server_name,
              args.intention,
              args.auth_data,
            ),
          ),
        ),
    );

    server.registerTool(
      "search_documentation",
      {
        description:
          "Search the actions of one connected server by keyword.",
        inputSchema: {
          query: z.string().describe("Search keywords"),
          server_name: z.string().describe("Server to search within"),
          max_results: z
            .number()
            .int()
            .min(1)
            .max(50)
            .default(10)
            .describe("Number of results to return"),
        },
      },
      async (args) =>
        respond("search_documentation", async () =>
          outcomeResult(
            await this.dispatcher.searchDocumentation(
              args.query,
              args.server_name,
              args.max_results,
            ),
          ),
        ),
    );
  }

  /**
   * Drops live sessions of servers no longer in the registry after an
   * on-disk change.
   */
  private async onRegistryChanged(
    servers: Map<string, ServerDefinition>,
  ): Promise<void> {
    const removed = this.connections
      .listActive()
      .filter((name) => !servers.has(name));
    for (const name of removed) {
      log.info(`${name} was removed from the registry, disconnecting`);
      await this.connections.disconnect(name);
    }
  }

  /**
   * Follows external edits of the registry file, disconnecting live
   * servers that disappear from it. Edits that leave the file unreadable
   * are ignored.
   */
  async watchRegistry(): Promise<void> {
    if (this.watcher) {
      return;
    }
    this.watcher = this.registry.watch((servers) => {
      this.onRegistryChanged(servers).catch((err: unknown) => {
        log.warn("Failed to apply registry change", err);
      });
    });
    await this.watcher.ready;
  }

  /**
   * Starts watching the registry (when enabled) and serves over stdio.
   */
  async start(): Promise<void> {
    if (this.settings.registry.watch) {
      await this.watchRegistry();
    }

    this.transport = new StdioServerTransport();
    await this.mcpServer.connect(this.transport);
    log.info(`${this.serverName} ${this.serverVersion} listening on stdio`);
  }

  /**
   * Closes the MCP connection, stops watching, disconnects every upstream
   * and waits for pending catalog writes.
   */
  async stop(): Promise<void> {
    await this.mcpServer.close();
    this.transport = null;

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    await this.connections.disconnectAll();
    await this.catalog.flush();
  }

  /**
   * Checks if the server is currently connected to a client.
   */
  isConnected(): boolean {
    return this.mcpServer.isConnected();
  }
}

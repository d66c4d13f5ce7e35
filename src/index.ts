#!/usr/bin/env node
/**
 * mcp-switchboard - Main entry point.
 *
 * A router that sits between one calling agent and many MCP servers. It
 * exposes a small set of meta-tools and keeps:
 *
 * - a registry of server definitions and composable Sets
 * - an offline catalog of every server's tools
 * - explicit, fire-and-forget connections over stdio, SSE and HTTP
 *
 * @module mcp-switchboard
 */

import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ToolCatalog } from "./catalog/index.js";
import { type CliArgs, parseArgs, printHelp } from "./cli/index.js";
import {
  ConfigError,
  type LoadConfigResult,
  type LogLevel,
  LogLevelSchema,
  loadConfig,
  loadConfigFromPath,
} from "./config/index.js";
import { ServerRegistry } from "./registry/index.js";
import { Dispatcher } from "./router/index.js";
import { SwitchboardServer } from "./server/index.js";
import { ConnectionManager } from "./upstream/index.js";
import { createLogger, setLogLevel } from "./utils/logger.js";
import { VERSION } from "./version.js";

export { VERSION } from "./version.js";
export * from "./catalog/index.js";
export * from "./errors.js";
export * from "./registry/index.js";
export * from "./router/index.js";
export { SwitchboardServer, type SwitchboardServerOptions } from "./server/index.js";
export * from "./upstream/index.js";

const log = createLogger("main");

/** Components shared by every mode, constructed once at startup */
export interface Runtime {
  config: LoadConfigResult;
  registry: ServerRegistry;
  catalog: ToolCatalog;
  connections: ConnectionManager;
}

/**
 * `SWITCHBOARD_LOG_LEVEL` wins over the settings file when it names a
 * valid level.
 */
export function resolveLogLevel(
  settingsLevel: LogLevel,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const parsed = LogLevelSchema.safeParse(env["SWITCHBOARD_LOG_LEVEL"]);
  return parsed.success ? parsed.data : settingsLevel;
}

/**
 * Loads settings and builds the registry, catalog and connection manager.
 *
 * @throws ConfigError if an explicit or discovered settings file is invalid
 */
export function createRuntime(args: CliArgs): Runtime {
  const config = args.configPath
    ? loadConfigFromPath(resolve(args.configPath), "cli")
    : loadConfig();
  setLogLevel(resolveLogLevel(config.settings.operations.logging.level));

  const registryPath = args.registryPath
    ? resolve(args.registryPath)
    : config.registryPath;
  const format = args.legacyFormat ? "legacy" : config.settings.registry.format;

  log.debug(
    `Settings: ${config.path ?? "defaults"} (${config.source}), registry: ${registryPath}, catalog: ${config.catalogPath}`,
  );

  return {
    config,
    registry: new ServerRegistry({ filePath: registryPath, format }),
    catalog: new ToolCatalog({ filePath: config.catalogPath }),
    connections: new ConnectionManager(),
  };
}

function createDispatcher(runtime: Runtime): Dispatcher {
  return new Dispatcher({
    registry: runtime.registry,
    catalog: runtime.catalog,
    connections: runtime.connections,
    search: runtime.config.settings.operations.search,
  });
}

/**
 * Starts the MCP server in stdio mode.
 * Sets up signal handlers and begins listening.
 * @internal
 */
async function startServer(runtime: Runtime): Promise<void> {
  const server = new SwitchboardServer({
    registry: runtime.registry,
    catalog: runtime.catalog,
    connections: runtime.connections,
    settings: runtime.config.settings,
  });

  // Track if shutdown is already in progress to prevent double cleanup
  let isShuttingDown = false;

  const gracefulShutdown = async (): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    // Force exit if shutdown takes too long (e.g. hung upstream)
    const forceExitTimer = setTimeout(() => {
      log.error("Forcing shutdown after timeout");
      process.exit(1);
    }, 5000);
    forceExitTimer.unref();

    try {
      await server.stop();
      process.exit(0);
    } catch (err) {
      log.error("Error during shutdown", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => {
    void gracefulShutdown();
  });

  process.on("SIGTERM", () => {
    void gracefulShutdown();
  });

  // Exit when the client goes away, so no orphaned router keeps upstreams alive
  process.stdin.on("close", () => {
    void gracefulShutdown();
  });

  await server.start();
}

/**
 * Prints configured servers and Sets.
 * @internal
 */
function runList(runtime: Runtime): void {
  const servers = runtime.registry.listServers();
  console.log(`Registry: ${runtime.registry.filePath}`);
  console.log(`\nServers (${servers.length}):`);
  for (const server of servers) {
    const target =
      server.transport === "stdio"
        ? [server.command, ...server.args].join(" ")
        : server.url;
    const cached = runtime.catalog.getTools(server.name).length;
    console.log(
      `  ${server.name} [${server.transport}${server.enabled ? "" : ", disabled"}] ${target} (${cached} cached tools)`,
    );
  }

  const sets = runtime.registry.listSets();
  console.log(`\nSets (${sets.length}):`);
  for (const set of sets) {
    const members = runtime.registry.getSet(set.name) ?? [];
    const description = set.description ? ` - ${set.description}` : "";
    console.log(`  ${set.name}${description}: ${members.join(", ")}`);
  }
}

/**
 * Indexes every enabled server missing from the catalog.
 * @internal
 */
async function runPopulate(runtime: Runtime): Promise<void> {
  try {
    console.log(await createDispatcher(runtime).populateCatalog());
  } finally {
    await runtime.connections.disconnectAll();
    await runtime.catalog.flush();
  }
}

/**
 * Searches the offline catalog and prints the JSON result.
 * @internal
 */
function runSearch(runtime: Runtime, query: string, maxResults?: number): void {
  const result = createDispatcher(runtime).searchCatalog(query, maxResults);
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Main entry point for the CLI.
 * Parses arguments and dispatches to the appropriate mode.
 * @internal
 */
export async function main(
  argv: string[] = process.argv.slice(2),
): Promise<void> {
  const args = parseArgs(argv);

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    console.log(`mcp-switchboard v${VERSION}`);
    process.exit(0);
  }

  if (args.unknown.length > 0) {
    console.error(`Unknown argument(s): ${args.unknown.join(" ")}`);
    printHelp();
    process.exit(1);
  }

  let runtime: Runtime;
  try {
    runtime = createRuntime(args);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal(err.message);
      process.exit(1);
    }
    throw err;
  }

  switch (args.mode) {
    case "list":
      runList(runtime);
      break;
    case "populate":
      await runPopulate(runtime);
      break;
    case "search":
      if (!args.searchQuery) {
        console.error("Error: search requires a query.");
        console.error("Usage: mcp-switchboard search <query>");
        process.exit(1);
      }
      runSearch(runtime, args.searchQuery, args.maxResults);
      break;
    default:
      await startServer(runtime);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    log.fatal("Fatal error", error);
    process.exit(1);
  });
}

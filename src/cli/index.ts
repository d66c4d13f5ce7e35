/**
 * Command-line interface argument parsing.
 *
 * Supports server mode (default) plus three one-shot commands that work
 * on the registry and catalog without an MCP client attached.
 *
 * @module cli
 */

/**
 * Parsed command-line arguments.
 */
export interface CliArgs {
  /** Operating mode: MCP server, registry listing, catalog population or catalog search */
  mode: "server" | "list" | "populate" | "search";
  /** Query for search mode */
  searchQuery: string | undefined;
  /** Result cap for search mode */
  maxResults: number | undefined;
  /** Explicit settings file (overrides discovery) */
  configPath: string | undefined;
  /** Explicit registry file (overrides settings) */
  registryPath: string | undefined;
  /** Write the registry in the legacy flat layout */
  legacyFormat: boolean;
  /** Whether --help was requested */
  help: boolean;
  /** Whether --version was requested */
  version: boolean;
  /** Arguments that were not understood */
  unknown: string[];
}

/**
 * Parses command-line arguments into a structured format.
 * Flags taking a value accept both `--flag value` and `--flag=value`.
 *
 * @param args - Command-line arguments (typically process.argv.slice(2))
 *
 * @example
 * ```ts
 * const args = parseArgs(["search", "translate", "--registry=servers.json"]);
 * // { mode: "search", searchQuery: "translate", registryPath: "servers.json", ... }
 * ```
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    mode: "server",
    searchQuery: undefined,
    maxResults: undefined,
    configPath: undefined,
    registryPath: undefined,
    legacyFormat: false,
    help: false,
    version: false,
    unknown: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Get value for --flag=value format
    const eqIndex = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const argName = eqIndex > 0 ? arg.slice(0, eqIndex) : arg;
    const inlineValue = eqIndex > 0 ? arg.slice(eqIndex + 1) : undefined;

    const takeValue = (): string | undefined => {
      if (inlineValue !== undefined) return inlineValue;
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        i++;
        return next;
      }
      return undefined;
    };

    switch (argName) {
      case "server":
        result.mode = "server";
        break;

      case "list":
        result.mode = "list";
        break;

      case "populate":
        result.mode = "populate";
        break;

      case "search": {
        result.mode = "search";
        const words: string[] = [];
        while (i + 1 < args.length && !args[i + 1]?.startsWith("-")) {
          i++;
          words.push(args[i] ?? "");
        }
        result.searchQuery = words.length > 0 ? words.join(" ") : undefined;
        break;
      }

      case "--config":
      case "-c":
        result.configPath = takeValue();
        break;

      case "--registry":
      case "-r":
        result.registryPath = takeValue();
        break;

      case "--max-results":
      case "-n": {
        const value = Number.parseInt(takeValue() ?? "", 10);
        result.maxResults = Number.isNaN(value) ? undefined : value;
        break;
      }

      case "--legacy-format":
        result.legacyFormat = true;
        break;

      case "--help":
      case "-h":
        result.help = true;
        break;

      case "--version":
      case "-v":
        result.version = true;
        break;

      default:
        result.unknown.push(arg);
    }
  }

  return result;
}

/**
 * Prints the help message to stdout.
 */
export function printHelp(): void {
  console.log(`
mcp-switchboard - Router between one agent and many MCP servers

Usage:
  mcp-switchboard [server]          Start the MCP server on stdio (default)
  mcp-switchboard list              List configured servers and Sets
  mcp-switchboard populate          Index enabled servers missing from the catalog
  mcp-switchboard search <query>    Search the offline tool catalog
  mcp-switchboard --help            Show this help message
  mcp-switchboard --version         Show version information

Options:
  --config, -c <path>               Settings file (default: discovered)
  --registry, -r <path>             Registry file (default: from settings)
  --legacy-format                   Write the registry in the legacy flat layout
  --max-results, -n <count>         Result cap for search
  --help, -h                        Show help
  --version, -v                     Show version

Environment:
  SWITCHBOARD_CONFIG                Settings file path
  SWITCHBOARD_LOG_LEVEL             fatal, error, warn, info, debug or trace

Examples:
  mcp-switchboard search translate text
  mcp-switchboard list --registry ./servers.json
  mcp-switchboard --legacy-format
`);
}

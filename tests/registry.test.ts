import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { InvalidSetError } from "../src/errors.js";
import { ServerRegistry } from "../src/registry/registry.js";
import { createTempDir, type TempDir } from "./helpers/temp-dir.js";

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

describe("ServerRegistry", () => {
  let temp: TempDir;
  let file: string;

  beforeEach(() => {
    temp = createTempDir();
    file = temp.path("servers.json");
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    temp.cleanup();
  });

  describe("servers", () => {
    test("starts empty when the file does not exist", () => {
      const registry = new ServerRegistry({ filePath: file });
      expect(registry.listServers()).toEqual([]);
      expect(registry.listSets()).toEqual([]);
    });

    test("upsertServer applies defaults and persists in the nested layout", () => {
      const registry = new ServerRegistry({ filePath: file });
      const changed = registry.upsertServer({
        name: "weather",
        transport: "stdio",
        command: "weather-mcp",
      });

      expect(changed).toBe(true);
      expect(registry.getServer("weather")).toEqual({
        name: "weather",
        transport: "stdio",
        command: "weather-mcp",
        args: [],
        env: {},
        enabled: true,
      });
      expect(readJson(file)).toEqual({
        mcp: {
          servers: {
            weather: { command: "weather-mcp", args: [], enabled: true },
          },
          sets: {},
        },
      });
    });

    test("an identical upsert reports no change and skips the write", () => {
      const registry = new ServerRegistry({ filePath: file });
      const def = {
        name: "weather",
        transport: "stdio" as const,
        command: "weather-mcp",
        args: ["--units", "metric"],
      };
      expect(registry.upsertServer(def)).toBe(true);
      rmSync(file);

      expect(registry.upsertServer(def)).toBe(false);
      expect(existsSync(file)).toBe(false);
    });

    test("a changed upsert replaces the stored definition", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "docs", transport: "sse", url: "https://docs.test/sse" });
      const changed = registry.upsertServer({
        name: "docs",
        transport: "http",
        url: "https://docs.test/mcp",
        auth: "test-secret",
      });

      expect(changed).toBe(true);
      expect(registry.getServer("docs")).toEqual({
        name: "docs",
        transport: "http",
        url: "https://docs.test/mcp",
        headers: {},
        auth: "test-secret",
        env: {},
        enabled: true,
      });
    });

    test("getServer returns undefined for unknown names", () => {
      const registry = new ServerRegistry({ filePath: file });
      expect(registry.getServer("missing")).toBeUndefined();
      expect(registry.hasServer("missing")).toBe(false);
    });

    test("listServers keeps insertion order and filters disabled servers", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "b", transport: "stdio", command: "b" });
      registry.upsertServer({ name: "a", transport: "stdio", command: "a", enabled: false });
      registry.upsertServer({ name: "c", transport: "stdio", command: "c" });

      expect(registry.listServers().map((s) => s.name)).toEqual(["b", "a", "c"]);
      expect(registry.listServers(true).map((s) => s.name)).toEqual(["b", "c"]);
    });

    test("enableServer and disableServer toggle and persist the flag", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "weather", transport: "stdio", command: "w" });

      expect(registry.disableServer("weather")).toBe(true);
      expect(registry.getServer("weather")?.enabled).toBe(false);
      expect(new ServerRegistry({ filePath: file }).getServer("weather")?.enabled).toBe(false);

      expect(registry.enableServer("weather")).toBe(true);
      expect(registry.getServer("weather")?.enabled).toBe(true);
      expect(registry.enableServer("missing")).toBe(false);
    });

    test("removeServer purges the name from every Set", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "weather", transport: "stdio", command: "w" });
      registry.upsertServer({ name: "maps", transport: "stdio", command: "m" });
      registry.upsertSet("travel", ["weather", "maps"], "Trip planning");
      registry.upsertSet("outdoor", ["weather"], "", ["travel"]);

      expect(registry.removeServer("weather")).toBe(true);
      expect(registry.getServer("weather")).toBeUndefined();
      expect(registry.getSet("travel")).toEqual(["maps"]);
      expect(registry.getSet("outdoor")).toEqual(["maps"]);

      const reloaded = new ServerRegistry({ filePath: file });
      expect(reloaded.getSetDetails("travel")?.servers).toEqual(["maps"]);
    });

    test("removeServer returns false when the server is absent", () => {
      const registry = new ServerRegistry({ filePath: file });
      expect(registry.removeServer("ghost")).toBe(false);
      expect(existsSync(file)).toBe(false);
    });
  });

  describe("sets", () => {
    test("resolves included Sets in first-seen order without duplicates", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("local", ["B", "C"]);
      registry.upsertSet("travel", ["A", "B"], "", ["local"]);

      expect(registry.getSet("travel")).toEqual(["A", "B", "C"]);
    });

    test("include cycles terminate", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("a", ["x"], "", ["b"]);
      registry.upsertSet("b", ["y"], "", ["c"]);
      registry.upsertSet("c", ["z", "x"], "", ["a"]);

      expect(registry.getSet("a")).toEqual(["x", "y", "z"]);
      expect(registry.getSet("c")).toEqual(["z", "x", "y"]);
    });

    test("a Set including itself resolves to its own members", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("loop", ["only"], "", ["loop"]);
      expect(registry.getSet("loop")).toEqual(["only"]);
    });

    test("getSet returns undefined for an unknown Set, and includes of unknown Sets add nothing", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("partial", ["A"], "", ["nowhere"]);

      expect(registry.getSet("missing")).toBeUndefined();
      expect(registry.getSet("partial")).toEqual(["A"]);
    });

    test("upsertSet rejects a missing name or an empty Set", () => {
      const registry = new ServerRegistry({ filePath: file });
      expect(() => registry.upsertSet("", ["A"])).toThrow(InvalidSetError);
      expect(() => registry.upsertSet("empty", [])).toThrow(
        "Set 'empty' needs servers or include_sets",
      );
      expect(() => registry.upsertSet("empty", [], "", [])).toThrow(InvalidSetError);
    });

    test("a Set made only of includes is accepted", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("base", ["A"]);
      registry.upsertSet("wrapper", [], "wraps base", ["base"]);
      expect(registry.getSet("wrapper")).toEqual(["A"]);
    });

    test("getSetDetails does not resolve includes", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("local", ["B"]);
      registry.upsertSet("travel", ["A"], "Trips", ["local"]);

      expect(registry.getSetDetails("travel")).toEqual({
        description: "Trips",
        servers: ["A"],
        includeSets: ["local"],
      });
      expect(registry.getSetDetails("missing")).toBeUndefined();
    });

    test("listSets normalizes the legacy bare-list shorthand", () => {
      writeFileSync(
        file,
        JSON.stringify({
          mcp: {
            servers: {},
            sets: {
              quick: ["a", "b"],
              full: { description: "All", servers: ["c"], include_sets: ["quick"] },
            },
          },
        }),
      );
      const registry = new ServerRegistry({ filePath: file });

      expect(registry.listSets()).toEqual([
        { name: "quick", description: "", servers: ["a", "b"], includeSets: [] },
        { name: "full", description: "All", servers: ["c"], includeSets: ["quick"] },
      ]);
      expect(registry.getSet("full")).toEqual(["c", "a", "b"]);
    });

    test("upsertSet stores include_sets only when given", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("plain", ["A"], "desc");
      registry.upsertSet("composed", ["B"], "", ["plain"]);

      expect(readJson(file)).toEqual({
        mcp: {
          servers: {},
          sets: {
            plain: { description: "desc", servers: ["A"] },
            composed: { description: "", servers: ["B"], include_sets: ["plain"] },
          },
        },
      });
    });

    test("removeSet deletes and reports absence", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertSet("travel", ["A"]);
      expect(registry.removeSet("travel")).toBe(true);
      expect(registry.getSet("travel")).toBeUndefined();
      expect(registry.removeSet("travel")).toBe(false);
    });
  });

  describe("persistence", () => {
    test("legacy format writes every field of every server", () => {
      const registry = new ServerRegistry({ filePath: file, format: "legacy" });
      registry.upsertServer({ name: "weather", transport: "stdio", command: "weather-mcp" });
      registry.upsertServer({
        name: "docs",
        transport: "sse",
        url: "https://docs.test/sse",
        headers: { "X-Team": "core" },
      });
      registry.upsertSet("all", ["weather", "docs"]);

      expect(registry.format).toBe("legacy");
      expect(readJson(file)).toEqual({
        servers: {
          weather: {
            name: "weather",
            type: "stdio",
            command: "weather-mcp",
            args: [],
            env: {},
            url: null,
            headers: {},
            auth: null,
            enabled: true,
          },
          docs: {
            name: "docs",
            type: "sse",
            command: "",
            args: [],
            env: {},
            url: "https://docs.test/sse",
            headers: { "X-Team": "core" },
            auth: null,
            enabled: true,
          },
        },
        sets: { all: { description: "", servers: ["weather", "docs"] } },
      });
    });

    test("nested format writes type only for remote servers", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({
        name: "api",
        transport: "http",
        url: "https://api.test/mcp",
        auth: "test-secret",
        env: { REGION: "eu" },
      });

      expect(readJson(file)).toEqual({
        mcp: {
          servers: {
            api: {
              type: "http",
              url: "https://api.test/mcp",
              auth: "test-secret",
              env: { REGION: "eu" },
              enabled: true,
            },
          },
          sets: {},
        },
      });
    });

    test("loads a legacy file and infers missing types", () => {
      writeFileSync(
        file,
        JSON.stringify({
          servers: {
            local: { command: "local-mcp", args: ["-v"] },
            remote: { url: "https://remote.test/sse" },
            streaming: { type: "http", url: "https://remote.test/mcp", command: "" },
          },
          sets: {},
        }),
      );
      const registry = new ServerRegistry({ filePath: file });

      expect(registry.getServer("local")?.transport).toBe("stdio");
      expect(registry.getServer("remote")?.transport).toBe("sse");
      expect(registry.getServer("streaming")?.transport).toBe("http");
    });

    test("invalid entries are skipped and the rest load", () => {
      writeFileSync(
        file,
        JSON.stringify({
          mcp: {
            servers: {
              good: { command: "good-mcp" },
              noCommand: { args: ["x"] },
              badUrl: { type: "sse", url: "not a url" },
            },
          },
        }),
      );
      const registry = new ServerRegistry({ filePath: file });
      expect(registry.listServers().map((s) => s.name)).toEqual(["good"]);
    });

    test("a malformed file degrades to an empty registry", () => {
      writeFileSync(file, "{not json");
      const registry = new ServerRegistry({ filePath: file });
      expect(registry.listServers()).toEqual([]);
      expect(console.error).toHaveBeenCalled();
    });

    test("entries skipped on load are written back unchanged", () => {
      writeFileSync(
        file,
        JSON.stringify({
          mcp: {
            servers: {
              weather: { command: "weather-mcp" },
              intranet: { type: "sse", url: "intranet.local/sse" },
              draft: { command: "" },
            },
            sets: { broken: 42 },
          },
        }),
      );
      const registry = new ServerRegistry({ filePath: file });
      expect(registry.listServers().map((s) => s.name)).toEqual(["weather"]);

      registry.upsertSet("travel", ["weather"]);

      expect(readJson(file)).toEqual({
        mcp: {
          servers: {
            weather: { command: "weather-mcp", args: [], enabled: true },
            intranet: { type: "sse", url: "intranet.local/sse" },
            draft: { command: "" },
          },
          sets: {
            travel: { description: "", servers: ["weather"] },
            broken: 42,
          },
        },
      });
    });

    test("upserting a skipped name replaces its raw entry", () => {
      writeFileSync(
        file,
        JSON.stringify({ mcp: { servers: { draft: { command: "" } } } }),
      );
      const registry = new ServerRegistry({ filePath: file });

      registry.upsertServer({ name: "draft", transport: "stdio", command: "draft-mcp" });

      expect(readJson(file)).toEqual({
        mcp: {
          servers: {
            draft: { command: "draft-mcp", args: [], enabled: true },
          },
          sets: {},
        },
      });
    });

    test("a file that failed to load is not overwritten", () => {
      writeFileSync(file, "{not json");
      const registry = new ServerRegistry({ filePath: file });

      registry.upsertServer({ name: "one", transport: "stdio", command: "one" });

      expect(readFileSync(file, "utf-8")).toBe("{not json");
      expect(registry.getServer("one")?.command).toBe("one");

      writeFileSync(file, JSON.stringify({ mcp: { servers: {} } }));
      expect(registry.reload()?.size).toBe(0);
      registry.upsertServer({ name: "two", transport: "stdio", command: "two" });

      expect(readJson(file)).toEqual({
        mcp: {
          servers: { two: { command: "two", args: [], enabled: true } },
          sets: {},
        },
      });
    });

    test("an unrecognized layout is not overwritten", () => {
      writeFileSync(file, JSON.stringify({ something: "else" }));
      const registry = new ServerRegistry({ filePath: file });

      registry.upsertSet("travel", ["weather"]);

      expect(readJson(file)).toEqual({ something: "else" });
    });

    test("reload keeps the previous state when the file is unreadable", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "one", transport: "stdio", command: "one" });

      writeFileSync(file, '{"mcp": {"servers": {"one": {"comm');

      expect(registry.reload()).toBeUndefined();
      expect(registry.getServer("one")?.command).toBe("one");
    });

    test("reload picks up external edits", () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "one", transport: "stdio", command: "one" });

      writeFileSync(
        file,
        JSON.stringify({ mcp: { servers: { two: { command: "two" } } } }),
      );
      const servers = registry.reload();

      expect(Array.from(servers?.keys() ?? [])).toEqual(["two"]);
      expect(registry.getServer("one")).toBeUndefined();
    });

    test("round-trips between layouts", () => {
      const legacy = new ServerRegistry({ filePath: file, format: "legacy" });
      legacy.upsertServer({
        name: "docs",
        transport: "sse",
        url: "https://docs.test/sse",
        auth: "test-secret",
      });
      legacy.upsertSet("reading", ["docs"], "Docs");

      const nested = new ServerRegistry({ filePath: file, format: "nested" });
      expect(nested.getServer("docs")).toEqual(legacy.getServer("docs"));
      expect(nested.getSetDetails("reading")).toEqual(legacy.getSetDetails("reading"));
    });
  });

  describe("watch", () => {
    test("reports external modifications with the refreshed servers", async () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "one", transport: "stdio", command: "one" });

      const changes: string[][] = [];
      const changed = new Promise<void>((resolve) => {
        const watcher = registry.watch((servers) => {
          changes.push(Array.from(servers.keys()));
          void watcher.close().then(resolve);
        });
        void watcher.ready.then(() => {
          writeFileSync(
            file,
            JSON.stringify({
              mcp: { servers: { one: { command: "one" }, two: { command: "two" } } },
            }),
          );
        });
      });

      await changed;
      expect(changes).toEqual([["one", "two"]]);
      expect(registry.getServer("two")?.transport).toBe("stdio");
    });

    test("ignores edits that leave the file unreadable", async () => {
      const registry = new ServerRegistry({ filePath: file });
      registry.upsertServer({ name: "one", transport: "stdio", command: "one" });

      const onChanged = vi.fn();
      const watcher = registry.watch(onChanged);
      await watcher.ready;
      writeFileSync(file, '{"mcp": {"servers": {"one": {"comm');

      await vi.waitFor(() =>
        expect(console.error).toHaveBeenCalledWith(
          `[switchboard:registry] Could not reload ${registry.filePath}, keeping previous state`,
        ),
      );
      await watcher.close();

      expect(onChanged).not.toHaveBeenCalled();
      expect(registry.getServer("one")?.command).toBe("one");
    });
  });
});

/**
 * Server/Set registry.
 *
 * Owns every configured server definition and every named Set. All
 * mutations persist immediately as a whole-file replace. The registry does
 * no network I/O.
 *
 * @module registry/registry
 */

import { readFileSync } from "node:fs";
import { basename, dirname, resolve } from "node:path";
import { isDeepStrictEqual } from "node:util";
import { type FSWatcher, watch } from "chokidar";
import type { RegistryFormat } from "../config/schema.js";
import {
  InvalidSetError,
  PersistenceError,
  SwitchboardError,
} from "../errors.js";
import { readJsonFile, writeJsonFileSync } from "../utils/json-file.js";
import { createLogger } from "../utils/logger.js";
import {
  codecFor,
  decodeRegistry,
  emptyDocument,
  type RegistryCodec,
  type RegistryDocument,
} from "./codecs.js";
import {
  normalizeStoredSet,
  type ServerDefinition,
  type ServerDefinitionInput,
  ServerDefinitionSchema,
  type SetDetails,
  type StoredSet,
} from "./schema.js";

const log = createLogger("registry");

export interface ServerRegistryOptions {
  /** Path of the registry JSON file */
  filePath: string;
  /** Layout used for writes (default: nested) */
  format?: RegistryFormat;
}

/** A Set in the normalized listing */
export interface NamedSet extends SetDetails {
  name: string;
}

export type RegistryChangeListener = (
  servers: Map<string, ServerDefinition>,
) => void;

export interface RegistryWatcher {
  /** Resolves once the underlying watcher is observing the file */
  readonly ready: Promise<void>;
  close(): Promise<void>;
}

/**
 * Stores server definitions and Sets, with file persistence.
 *
 * @example
 * ```ts
 * const registry = new ServerRegistry({ filePath: "servers.json" });
 * registry.upsertServer({ name: "weather", transport: "stdio", command: "weather-mcp" });
 * registry.upsertSet("travel", ["weather", "maps"], "Trip planning");
 * registry.getSet("travel"); // ["weather", "maps"]
 * ```
 */
export class ServerRegistry {
  readonly filePath: string;
  private readonly codec: RegistryCodec;
  private servers = new Map<string, ServerDefinition>();
  private sets = new Map<string, StoredSet>();
  private skippedServers = new Map<string, unknown>();
  private skippedSets = new Map<string, unknown>();
  /** Set while the file on disk could not be read; writes are refused */
  private unreadable = false;
  /** Last text this instance wrote or read, to ignore its own file events */
  private lastSeenText: string | null = null;
  private watcher: FSWatcher | null = null;

  constructor(options: ServerRegistryOptions) {
    this.filePath = resolve(options.filePath);
    this.codec = codecFor(options.format ?? "nested");
    this.load();
  }

  /** Layout used for writes */
  get format(): RegistryFormat {
    return this.codec.format;
  }

  /**
   * Replaces the in-memory state with the file's contents.
   * An unreadable or malformed file yields an empty registry, and the file
   * is left alone until a later load or reload succeeds.
   */
  load(): void {
    const document = this.readDocument();
    if (document) {
      this.apply(document);
      return;
    }
    log.warn(`Could not load ${this.filePath}, starting empty`);
    this.apply(emptyDocument());
    this.unreadable = true;
  }

  /**
   * Re-reads the file and returns the refreshed server map, or undefined
   * when the file could not be read. The previous state is kept in that
   * case.
   */
  reload(): Map<string, ServerDefinition> | undefined {
    const document = this.readDocument();
    if (!document) {
      log.warn(`Could not reload ${this.filePath}, keeping previous state`);
      return undefined;
    }
    this.apply(document);
    return new Map(this.servers);
  }

  private readDocument(): RegistryDocument | null {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (err) {
      if (err instanceof PersistenceError) {
        log.warn(err.message);
        return null;
      }
      throw err;
    }

    const { document, warnings, recognized } = decodeRegistry(raw);
    for (const warning of warnings) {
      log.warn(`${this.filePath}: ${warning}`);
    }
    if (!recognized) {
      return null;
    }
    this.lastSeenText = raw === undefined ? null : this.readText();
    return document;
  }

  private apply(document: RegistryDocument): void {
    this.servers = document.servers;
    this.sets = document.sets;
    this.skippedServers = document.skippedServers;
    this.skippedSets = document.skippedSets;
    this.unreadable = false;
  }

  // --- Servers ---

  /**
   * Adds or replaces a server definition.
   *
   * @returns true if the stored value changed (and was persisted)
   */
  upsertServer(input: ServerDefinitionInput): boolean {
    const server = ServerDefinitionSchema.parse(input);
    const existing = this.servers.get(server.name);
    if (existing && isDeepStrictEqual(existing, server)) {
      return false;
    }
    this.servers.set(server.name, server);
    this.skippedServers.delete(server.name);
    this.persist();
    return true;
  }

  /**
   * Removes a server and purges it from every Set.
   *
   * @returns false if no such server was configured
   */
  removeServer(name: string): boolean {
    const dropped = this.skippedServers.delete(name);
    if (!this.servers.delete(name)) {
      if (dropped) this.persist();
      return dropped;
    }
    for (const [setName, stored] of this.sets) {
      if (Array.isArray(stored)) {
        this.sets.set(
          setName,
          stored.filter((member) => member !== name),
        );
      } else {
        this.sets.set(setName, {
          ...stored,
          servers: stored.servers.filter((member) => member !== name),
        });
      }
    }
    this.persist();
    return true;
  }

  getServer(name: string): ServerDefinition | undefined {
    return this.servers.get(name);
  }

  hasServer(name: string): boolean {
    return this.servers.has(name);
  }

  listServers(enabledOnly = false): ServerDefinition[] {
    const servers = Array.from(this.servers.values());
    return enabledOnly ? servers.filter((s) => s.enabled) : servers;
  }

  enableServer(name: string): boolean {
    return this.setEnabled(name, true);
  }

  disableServer(name: string): boolean {
    return this.setEnabled(name, false);
  }

  private setEnabled(name: string, enabled: boolean): boolean {
    const server = this.servers.get(name);
    if (!server) {
      return false;
    }
    if (server.enabled !== enabled) {
      this.servers.set(name, { ...server, enabled });
      this.persist();
    }
    return true;
  }

  // --- Sets ---

  /**
   * Adds or replaces a Set.
   *
   * @throws InvalidSetError if the name is empty or the Set has no members
   *   and includes no other Set
   */
  upsertSet(
    name: string,
    servers: string[],
    description = "",
    includeSets?: string[],
  ): void {
    if (!name) {
      throw new InvalidSetError("Set name is required");
    }
    if (servers.length === 0 && (includeSets?.length ?? 0) === 0) {
      throw new InvalidSetError(
        `Set '${name}' needs servers or include_sets`,
      );
    }

    const stored: Exclude<StoredSet, string[]> = {
      description,
      servers: [...servers],
    };
    if (includeSets && includeSets.length > 0) {
      stored.include_sets = [...includeSets];
    }
    this.sets.set(name, stored);
    this.skippedSets.delete(name);
    this.persist();
  }

  removeSet(name: string): boolean {
    const dropped = this.skippedSets.delete(name);
    if (!this.sets.delete(name) && !dropped) {
      return false;
    }
    this.persist();
    return true;
  }

  /**
   * Resolves a Set to its full membership: direct servers, then each
   * included Set's members, first-seen order, no duplicates. A Set seen
   * twice while resolving contributes nothing the second time, so include
   * cycles terminate.
   *
   * @returns Member names, or undefined if the Set is not defined
   */
  getSet(name: string): string[] | undefined {
    return this.resolveSet(name, new Set());
  }

  private resolveSet(name: string, visited: Set<string>): string[] | undefined {
    if (visited.has(name)) {
      return [];
    }
    visited.add(name);

    const stored = this.sets.get(name);
    if (stored === undefined) {
      return undefined;
    }

    const details = normalizeStoredSet(stored);
    const members: string[] = [];
    const add = (server: string): void => {
      if (!members.includes(server)) {
        members.push(server);
      }
    };

    details.servers.forEach(add);
    for (const included of details.includeSets) {
      this.resolveSet(included, visited)?.forEach(add);
    }
    return members;
  }

  /** Description and direct members, without resolving includes */
  getSetDetails(name: string): SetDetails | undefined {
    const stored = this.sets.get(name);
    return stored === undefined ? undefined : normalizeStoredSet(stored);
  }

  listSets(): NamedSet[] {
    return Array.from(this.sets.entries()).map(([name, stored]) => ({
      name,
      ...normalizeStoredSet(stored),
    }));
  }

  // --- Watching ---

  /**
   * Watches the registry file and calls `onChanged` with the refreshed
   * server map whenever another process modifies it. Only one subscriber
   * is kept; calling again replaces it.
   */
  watch(onChanged: RegistryChangeListener): RegistryWatcher {
    if (this.watcher) {
      const previous = this.watcher;
      this.watcher = null;
      previous.close().catch((err: unknown) => {
        log.warn("Failed to close previous registry watcher", err);
      });
    }

    const fileName = basename(this.filePath);
    const watcher = watch(dirname(this.filePath), {
      ignoreInitial: true,
      depth: 0,
    });
    this.watcher = watcher;

    const onEvent = (path: string): void => {
      if (basename(path) !== fileName) return;
      const text = this.readText();
      if (text === null || text === this.lastSeenText) return;
      log.info(`${this.filePath} changed on disk, reloading`);
      const servers = this.reload();
      if (servers) onChanged(servers);
    };
    watcher.on("add", onEvent);
    watcher.on("change", onEvent);
    watcher.on("error", (err: unknown) => {
      log.warn("Registry watcher error", err);
    });

    const ready = new Promise<void>((resolveReady) => {
      watcher.once("ready", () => resolveReady());
    });

    return {
      ready,
      close: async () => {
        if (this.watcher === watcher) {
          this.watcher = null;
        }
        await watcher.close();
      },
    };
  }

  // --- Persistence ---

  private readText(): string | null {
    try {
      return readFileSync(this.filePath, "utf-8");
    } catch {
      return null;
    }
  }

  private snapshot(): RegistryDocument {
    return {
      servers: this.servers,
      sets: this.sets,
      skippedServers: this.skippedServers,
      skippedSets: this.skippedSets,
    };
  }

  /**
   * Writes the whole registry. A failed write is logged and the in-memory
   * state is kept. Nothing is written over a file that failed to load.
   */
  private persist(): void {
    if (this.unreadable) {
      log.error(
        `Not writing ${this.filePath}: it could not be read; fix or remove it first`,
      );
      return;
    }
    try {
      this.lastSeenText = writeJsonFileSync(
        this.filePath,
        this.codec.encode(this.snapshot()),
      );
    } catch (err) {
      if (err instanceof SwitchboardError) {
        log.error(err.message);
        return;
      }
      throw err;
    }
  }
}

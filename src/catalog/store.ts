/**
 * Persistent offline tool catalog.
 *
 * The cache file maps each server name to the tool list it reported on its
 * most recent successful listing. It is the only state that answers "what
 * tools exist" without a live connection.
 *
 * @module catalog/store
 */

import { resolve } from "node:path";
import { SwitchboardError } from "../errors.js";
import { readJsonFile, SerializedJsonWriter } from "../utils/json-file.js";
import { createLogger } from "../utils/logger.js";
import { ToolSearcher } from "./search.js";
import {
  type SearchHit,
  type ToolDescriptor,
  ToolDescriptorSchema,
} from "./types.js";

const log = createLogger("catalog");

const DEFAULT_MAX_RESULTS = 20;

export interface ToolCatalogOptions {
  /** Path of the catalog JSON file */
  filePath: string;
}

function cloneTools(tools: readonly ToolDescriptor[]): ToolDescriptor[] {
  return tools.map((tool) => ({ ...tool }));
}

/**
 * Server name to tool list cache, persisted as one JSON document.
 *
 * @example
 * ```ts
 * const catalog = new ToolCatalog({ filePath: "tool_catalog.json" });
 * await catalog.updateServer("nlp", tools);
 * catalog.search("translate");
 * ```
 */
export class ToolCatalog {
  readonly filePath: string;
  private entries = new Map<string, ToolDescriptor[]>();
  private readonly writer: SerializedJsonWriter;

  constructor(options: ToolCatalogOptions) {
    this.filePath = resolve(options.filePath);
    this.writer = new SerializedJsonWriter(this.filePath);
    this.load();
  }

  /**
   * Replaces the in-memory catalog with the file's contents. An unreadable
   * file leaves the current state untouched; invalid tool entries are
   * skipped.
   */
  load(): void {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (err) {
      log.warn(`Could not load ${this.filePath}, keeping current catalog`, err);
      return;
    }
    if (raw === undefined) {
      return;
    }
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      log.warn(`${this.filePath}: expected an object of server tool lists`);
      return;
    }

    const entries = new Map<string, ToolDescriptor[]>();
    for (const [server, value] of Object.entries(raw)) {
      if (!Array.isArray(value)) {
        log.warn(`${this.filePath}: entry '${server}' is not a list, skipped`);
        continue;
      }
      const tools: ToolDescriptor[] = [];
      for (const item of value) {
        const parsed = ToolDescriptorSchema.safeParse(item);
        if (parsed.success) {
          tools.push(parsed.data);
        } else {
          log.warn(`${this.filePath}: invalid tool under '${server}', skipped`);
        }
      }
      entries.set(server, tools);
    }
    this.entries = entries;
    log.debug(`Loaded ${entries.size} server(s) from ${this.filePath}`);
  }

  /**
   * Replaces a server's entry wholesale and persists the catalog.
   * A failed write is logged; the in-memory entry is kept.
   */
  async updateServer(
    serverName: string,
    tools: readonly ToolDescriptor[],
  ): Promise<void> {
    this.entries.set(serverName, cloneTools(tools));
    await this.persist();
  }

  /** Cached tools for a server, or an empty list if never indexed */
  getTools(serverName: string): ToolDescriptor[] {
    const tools = this.entries.get(serverName);
    return tools ? cloneTools(tools) : [];
  }

  hasTools(serverName: string): boolean {
    return (this.entries.get(serverName)?.length ?? 0) > 0;
  }

  getAllTools(): Map<string, ToolDescriptor[]> {
    const snapshot = new Map<string, ToolDescriptor[]>();
    for (const [server, tools] of this.entries) {
      snapshot.set(server, cloneTools(tools));
    }
    return snapshot;
  }

  search(query: string, maxResults = DEFAULT_MAX_RESULTS): SearchHit[] {
    if (this.entries.size === 0) {
      return [];
    }
    return new ToolSearcher(this.entries, "catalog").search(query, maxResults);
  }

  /**
   * Drops a server's entry. Persists only when an entry existed.
   */
  async removeServer(serverName: string): Promise<boolean> {
    if (!this.entries.delete(serverName)) {
      return false;
    }
    await this.persist();
    return true;
  }

  /** Resolves once every queued write has settled */
  flush(): Promise<void> {
    return this.writer.flush();
  }

  private toDocument(): Record<string, ToolDescriptor[]> {
    return Object.fromEntries(this.entries);
  }

  private async persist(): Promise<void> {
    try {
      await this.writer.write(() => this.toDocument());
    } catch (err) {
      if (err instanceof SwitchboardError) {
        log.error(err.message);
        return;
      }
      throw err;
    }
  }
}

/**
 * On-disk layouts of the registry file.
 *
 * Both layouts are decoded on load; which one applies is sniffed from the
 * document's structure. Writes always use the codec the registry was
 * constructed with.
 *
 * nested:
 * ```json
 * { "mcp": { "servers": { "weather": { "command": "weather-mcp", "args": [], "enabled": true } },
 *            "sets": { "travel": { "description": "...", "servers": ["weather"] } } } }
 * ```
 *
 * legacy:
 * ```json
 * { "servers": { "weather": { "name": "weather", "type": "stdio", "command": "weather-mcp", ... } },
 *   "sets": { "travel": ["weather"] } }
 * ```
 *
 * @module registry/codecs
 */

import type { RegistryFormat } from "../config/schema.js";
import {
  normalizeServerEntry,
  RawServerEntrySchema,
  type ServerDefinition,
  type StoredSet,
  StoredSetSchema,
} from "./schema.js";

/** In-memory contents of a registry file */
export interface RegistryDocument {
  servers: Map<string, ServerDefinition>;
  sets: Map<string, StoredSet>;
  /** Entries that failed validation, kept as found and written back as-is */
  skippedServers: Map<string, unknown>;
  skippedSets: Map<string, unknown>;
}

/** Problems found while decoding; the offending entries are skipped */
export type DecodeWarning = string;

export interface DecodeResult {
  document: RegistryDocument;
  format: RegistryFormat;
  warnings: DecodeWarning[];
  /** False when a document was present but matched neither layout */
  recognized: boolean;
}

export interface RegistryCodec {
  readonly format: RegistryFormat;
  encode(document: RegistryDocument): unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function emptyDocument(): RegistryDocument {
  return {
    servers: new Map(),
    sets: new Map(),
    skippedServers: new Map(),
    skippedSets: new Map(),
  };
}

/** Skipped entries go after the valid ones; a valid entry of the same name wins */
function withSkipped(
  entries: Record<string, unknown>,
  skipped: Map<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...entries };
  for (const [name, raw] of skipped) {
    if (!(name in merged)) {
      merged[name] = raw;
    }
  }
  return merged;
}

function encodeSets(document: RegistryDocument): Record<string, unknown> {
  return withSkipped(Object.fromEntries(document.sets), document.skippedSets);
}

/**
 * Nested layout: type-specific fields only, `type` omitted for stdio,
 * empty maps omitted, `enabled` always written.
 */
export const nestedCodec: RegistryCodec = {
  format: "nested",
  encode(document) {
    const servers: Record<string, Record<string, unknown>> = {};
    for (const [name, server] of document.servers) {
      const entry: Record<string, unknown> = {};
      if (server.transport === "stdio") {
        entry["command"] = server.command;
        entry["args"] = server.args;
      } else {
        entry["type"] = server.transport;
        entry["url"] = server.url;
        if (Object.keys(server.headers).length > 0) {
          entry["headers"] = server.headers;
        }
        if (server.auth) {
          entry["auth"] = server.auth;
        }
      }
      if (Object.keys(server.env).length > 0) {
        entry["env"] = server.env;
      }
      entry["enabled"] = server.enabled;
      servers[name] = entry;
    }
    return {
      mcp: {
        servers: withSkipped(servers, document.skippedServers),
        sets: encodeSets(document),
      },
    };
  },
};

/**
 * Legacy layout: every field of every server, including the ones that do
 * not apply to its transport.
 */
export const legacyCodec: RegistryCodec = {
  format: "legacy",
  encode(document) {
    const servers: Record<string, Record<string, unknown>> = {};
    for (const [name, server] of document.servers) {
      const remote = server.transport === "stdio" ? null : server;
      servers[name] = {
        name,
        type: server.transport,
        command: server.transport === "stdio" ? server.command : "",
        args: server.transport === "stdio" ? server.args : [],
        env: server.env,
        url: remote?.url ?? null,
        headers: remote?.headers ?? {},
        auth: remote?.auth ?? null,
        enabled: server.enabled,
      };
    }
    return {
      servers: withSkipped(servers, document.skippedServers),
      sets: encodeSets(document),
    };
  },
};

export function codecFor(format: RegistryFormat): RegistryCodec {
  return format === "legacy" ? legacyCodec : nestedCodec;
}

/**
 * Picks the layout of a parsed document.
 * A `mcp` object holding a `servers` object selects nested.
 */
export function detectFormat(raw: unknown): RegistryFormat | null {
  if (!isRecord(raw)) {
    return null;
  }
  const nested = raw["mcp"];
  if (isRecord(nested) && isRecord(nested["servers"])) {
    return "nested";
  }
  if (isRecord(raw["servers"])) {
    return "legacy";
  }
  return null;
}

function decodeSection(
  serversRaw: unknown,
  setsRaw: unknown,
  warnings: DecodeWarning[],
): RegistryDocument {
  const document = emptyDocument();

  if (isRecord(serversRaw)) {
    for (const [name, value] of Object.entries(serversRaw)) {
      const entry = RawServerEntrySchema.safeParse(value);
      if (!entry.success) {
        warnings.push(`server '${name}' skipped: not a valid entry`);
        document.skippedServers.set(name, value);
        continue;
      }
      const normalized = normalizeServerEntry(name, entry.data);
      if (!normalized.ok) {
        warnings.push(
          `server '${name}' skipped: ${normalized.issues.join("; ")}`,
        );
        document.skippedServers.set(name, value);
        continue;
      }
      document.servers.set(name, normalized.server);
    }
  }

  if (isRecord(setsRaw)) {
    for (const [name, value] of Object.entries(setsRaw)) {
      const stored = StoredSetSchema.safeParse(value);
      if (!stored.success) {
        warnings.push(`set '${name}' skipped: not a valid set`);
        document.skippedSets.set(name, value);
        continue;
      }
      document.sets.set(name, stored.data);
    }
  }

  return document;
}

/**
 * Decodes a parsed registry file of either layout.
 * Unrecognized documents decode to an empty registry with a warning.
 * Invalid entries are reported and kept aside in `skippedServers` and
 * `skippedSets`.
 */
export function decodeRegistry(raw: unknown): DecodeResult {
  const warnings: DecodeWarning[] = [];
  const format = detectFormat(raw);

  if (format === null || !isRecord(raw)) {
    const recognized = raw === undefined;
    if (!recognized) {
      warnings.push("unrecognized registry layout, starting empty");
    }
    return { document: emptyDocument(), format: "nested", warnings, recognized };
  }

  if (format === "nested") {
    const nested = raw["mcp"];
    const section = isRecord(nested) ? nested : {};
    return {
      document: decodeSection(section["servers"], section["sets"], warnings),
      format,
      warnings,
      recognized: true,
    };
  }

  return {
    document: decodeSection(raw["servers"], raw["sets"], warnings),
    format,
    warnings,
    recognized: true,
  };
}

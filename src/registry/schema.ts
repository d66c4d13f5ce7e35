/**
 * Server and Set definitions.
 *
 * A server definition is a closed tagged variant on `transport`; only the
 * fields of its own variant exist on the value. Raw on-disk entries are
 * looser (either layout, missing `type`, irrelevant fields kept for
 * round-tripping) and are normalized through {@link normalizeServerEntry}.
 *
 * @module registry/schema
 */

import { z } from "zod";

/** Schema for key/value string maps (env, headers) */
const StringRecordSchema = z.record(z.string(), z.string());

const ServerBaseSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  env: StringRecordSchema.default({}),
});

/** Schema for servers spawned as a subprocess speaking over stdio */
export const StdioServerSchema = ServerBaseSchema.extend({
  transport: z.literal("stdio"),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});

const RemoteFields = {
  url: z.string().url(),
  headers: StringRecordSchema.default({}),
  /** Bearer token sent with every request */
  auth: z.string().min(1).optional(),
};

/** Schema for servers reached over a Server-Sent Events stream */
export const SseServerSchema = ServerBaseSchema.extend({
  transport: z.literal("sse"),
  ...RemoteFields,
});

/** Schema for servers reached over streamable HTTP */
export const HttpServerSchema = ServerBaseSchema.extend({
  transport: z.literal("http"),
  ...RemoteFields,
});

export const ServerDefinitionSchema = z.discriminatedUnion("transport", [
  StdioServerSchema,
  SseServerSchema,
  HttpServerSchema,
]);

export type ServerDefinition = z.infer<typeof ServerDefinitionSchema>;
/** Server definition before defaults are applied */
export type ServerDefinitionInput = z.input<typeof ServerDefinitionSchema>;
export type StdioServerDefinition = z.infer<typeof StdioServerSchema>;
export type SseServerDefinition = z.infer<typeof SseServerSchema>;
export type HttpServerDefinition = z.infer<typeof HttpServerSchema>;
export type RemoteServerDefinition = SseServerDefinition | HttpServerDefinition;
export type TransportKind = ServerDefinition["transport"];

/**
 * Schema for a server entry as found on disk, in either layout.
 * Nothing is required here; {@link normalizeServerEntry} decides.
 */
export const RawServerEntrySchema = z
  .object({
    name: z.string().nullish(),
    type: z.string().nullish(),
    transport: z.string().nullish(),
    command: z.string().nullish(),
    args: z.array(z.string()).nullish(),
    env: StringRecordSchema.nullish(),
    url: z.string().nullish(),
    headers: StringRecordSchema.nullish(),
    auth: z.string().nullish(),
    enabled: z.boolean().nullish(),
  })
  .passthrough();

export type RawServerEntry = z.infer<typeof RawServerEntrySchema>;

/** A Set as stored: the legacy bare list of names, or the full record */
export const StoredSetSchema = z.union([
  z.array(z.string()),
  z
    .object({
      description: z.string().default(""),
      servers: z.array(z.string()).default([]),
      include_sets: z.array(z.string()).optional(),
    })
    .passthrough(),
]);

export type StoredSet = z.infer<typeof StoredSetSchema>;

/** Normalized view of a Set, regardless of how it is stored */
export interface SetDetails {
  description: string;
  /** Direct members, unresolved */
  servers: string[];
  includeSets: string[];
}

export function normalizeStoredSet(stored: StoredSet): SetDetails {
  if (Array.isArray(stored)) {
    return { description: "", servers: [...stored], includeSets: [] };
  }
  return {
    description: stored.description,
    servers: [...stored.servers],
    includeSets: [...(stored.include_sets ?? [])],
  };
}

/**
 * Resolves the transport kind of a raw entry.
 * Missing type means stdio, unless the entry only carries a URL.
 */
function resolveTransport(raw: RawServerEntry): string {
  const declared = raw.type ?? raw.transport;
  if (declared) {
    return declared;
  }
  return raw.url && !raw.command ? "sse" : "stdio";
}

export type NormalizeResult =
  | { ok: true; server: ServerDefinition }
  | { ok: false; issues: string[] };

/**
 * Turns a raw on-disk entry into a server definition, keeping only the
 * fields that belong to its transport.
 */
export function normalizeServerEntry(
  name: string,
  raw: RawServerEntry,
): NormalizeResult {
  const transport = resolveTransport(raw);
  const base = {
    name,
    enabled: raw.enabled ?? true,
    env: raw.env ?? {},
  };

  const candidate =
    transport === "stdio"
      ? { ...base, transport, command: raw.command ?? "", args: raw.args ?? [] }
      : {
          ...base,
          transport,
          url: raw.url ?? "",
          headers: raw.headers ?? {},
          ...(raw.auth ? { auth: raw.auth } : {}),
        };

  const parsed = ServerDefinitionSchema.safeParse(candidate);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(
        (i) => `${i.path.join(".") || "entry"}: ${i.message}`,
      ),
    };
  }
  return { ok: true, server: parsed.data };
}

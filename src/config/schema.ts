/**
 * Settings schema definitions using Zod.
 *
 * Settings live in a TOML file separate from the server registry: they say
 * where the registry and catalog files are, which on-disk layout the
 * registry writes, and how the router logs and searches.
 *
 * @module config/schema
 */

import { z } from "zod";

/** Current settings schema version */
export const LATEST_SCHEMA_VERSION = 1;

/**
 * Schema for log levels (fatal through trace).
 */
export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
]);

/** Available log levels */
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * On-disk layouts of the registry file.
 * - nested: `{ mcp: { servers, sets } }` with type-specific fields only
 * - legacy: `{ servers, sets }` with every field of every server
 */
export const RegistryFormatSchema = z.enum(["nested", "legacy"]);

export type RegistryFormat = z.infer<typeof RegistryFormatSchema>;

/** Schema for the registry section */
export const RegistrySettingsSchema = z.object({
  /** Registry file path (default: `<user config dir>/servers.json`) */
  path: z.string().min(1).optional(),
  format: RegistryFormatSchema.default("nested"),
  /** Reload the registry when the file changes on disk */
  watch: z.boolean().default(true),
});

/** Schema for the catalog section */
export const CatalogSettingsSchema = z.object({
  /** Catalog cache path (default: `<user cache dir>/tool_catalog.json`) */
  path: z.string().min(1).optional(),
});

/** Schema for search limits shared by catalog and live search */
export const SearchSettingsSchema = z
  .object({
    defaultMaxResults: z.number().int().min(1).default(20),
    maxResults: z.number().int().min(1).max(500).default(100),
  })
  .refine((s) => s.defaultMaxResults <= s.maxResults, {
    message: "defaultMaxResults must not exceed maxResults",
    path: ["defaultMaxResults"],
  });

/** Schema for logging configuration */
export const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
});

export const OperationsSchema = z
  .object({
    search: SearchSettingsSchema.default({
      defaultMaxResults: 20,
      maxResults: 100,
    }),
    logging: LoggingSchema.default({ level: "info" }),
  })
  .default({
    search: { defaultMaxResults: 20, maxResults: 100 },
    logging: { level: "info" },
  });

/**
 * Root settings schema.
 * Defines the complete structure of switchboard.toml files.
 */
export const SettingsSchema = z.object({
  schemaVersion: z.literal(LATEST_SCHEMA_VERSION).default(LATEST_SCHEMA_VERSION),
  registry: RegistrySettingsSchema.default({ format: "nested", watch: true }),
  catalog: CatalogSettingsSchema.default({}),
  operations: OperationsSchema,
});

/** Complete settings type */
export type SwitchboardSettings = z.infer<typeof SettingsSchema>;

/** Settings with all defaults applied */
export const DEFAULT_SETTINGS: SwitchboardSettings = SettingsSchema.parse({});

/**
 * Settings module exports.
 *
 * - Multi-scope path discovery (env, project, user)
 * - TOML parsing with Zod schema validation
 * - Default registry and catalog locations
 *
 * @module config
 */

export {
  DEFAULT_SETTINGS,
  LATEST_SCHEMA_VERSION,
  LogLevelSchema,
  RegistryFormatSchema,
  SettingsSchema,
  type LogLevel,
  type RegistryFormat,
  type SwitchboardSettings,
} from "./schema.js";

export {
  discoverConfigPath,
  ensureParentDir,
  getDefaultCatalogPath,
  getDefaultRegistryPath,
  getUserCacheDir,
  getUserConfigDir,
  type ConfigPathResult,
  type ConfigSource,
} from "./paths.js";

export {
  ConfigError,
  ConfigParseError,
  ConfigValidationError,
  loadConfig,
  loadConfigFromPath,
  type LoadConfigResult,
} from "./load.js";

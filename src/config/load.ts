import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import { ZodError } from "zod";
import {
  type ConfigSource,
  discoverConfigPath,
  getDefaultCatalogPath,
  getDefaultRegistryPath,
} from "./paths.js";
import {
  DEFAULT_SETTINGS,
  SettingsSchema,
  type SwitchboardSettings,
} from "./schema.js";

export class ConfigError extends Error {
  override cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ConfigError";
    this.cause = cause;
  }
}

export class ConfigParseError extends ConfigError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(`Failed to parse settings file: ${filePath}`, cause);
    this.name = "ConfigParseError";
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly filePath: string,
    public readonly zodError: ZodError,
  ) {
    const issues = zodError.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    super(`Invalid settings in ${filePath}:\n${issues}`, zodError);
    this.name = "ConfigValidationError";
  }
}

export interface LoadConfigResult {
  settings: SwitchboardSettings;
  /** Settings file the values came from; null when defaults were used */
  path: string | null;
  source: ConfigSource | "default";
  /** Registry file path with the default applied */
  registryPath: string;
  /** Catalog cache path with the default applied */
  catalogPath: string;
}

function withResolvedPaths(
  settings: SwitchboardSettings,
  path: string | null,
  source: ConfigSource | "default",
): LoadConfigResult {
  // Relative paths in a settings file are relative to that file.
  const base = path ? dirname(path) : process.cwd();
  return {
    settings,
    path,
    source,
    registryPath: settings.registry.path
      ? resolve(base, settings.registry.path)
      : getDefaultRegistryPath(),
    catalogPath: settings.catalog.path
      ? resolve(base, settings.catalog.path)
      : getDefaultCatalogPath(),
  };
}

/**
 * Loads settings from the discovered file, or returns defaults when no
 * settings file exists anywhere in scope.
 */
export function loadConfig(cwd?: string): LoadConfigResult {
  const discovered = discoverConfigPath(cwd);

  if (!discovered) {
    return withResolvedPaths(DEFAULT_SETTINGS, null, "default");
  }

  return loadConfigFromPath(discovered.path, discovered.source);
}

export function loadConfigFromPath(
  filePath: string,
  source: ConfigSource,
): LoadConfigResult {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigParseError(filePath, err);
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (err) {
    throw new ConfigParseError(filePath, err);
  }

  let settings: SwitchboardSettings;
  try {
    settings = SettingsSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigValidationError(filePath, err);
    }
    throw err;
  }

  return withResolvedPaths(settings, filePath, source);
}

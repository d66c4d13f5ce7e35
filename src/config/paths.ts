/**
 * Settings, registry and catalog path discovery.
 *
 * Settings are found with a multi-scope strategy:
 * 1. Environment variable (SWITCHBOARD_CONFIG)
 * 2. Project-local file (switchboard.toml or .switchboard/config.toml)
 * 3. User-level file (~/.config/switchboard/config.toml)
 *
 * The registry defaults to the user config directory and the tool catalog
 * to the user cache directory.
 *
 * @module config/paths
 */

import { existsSync, mkdirSync } from "node:fs";
import { homedir, platform } from "node:os";
import { dirname, join, resolve } from "node:path";

/**
 * Source of the discovered settings file.
 * - env: Found via SWITCHBOARD_CONFIG environment variable
 * - project: Found in project directory tree
 * - user: Found in user's config directory
 * - cli: Named with --config
 */
export type ConfigSource = "env" | "project" | "user" | "cli";

export interface ConfigPathResult {
  /** Absolute path to the settings file */
  path: string;
  /** Where the settings were found */
  source: ConfigSource;
}

const CONFIG_FILENAME = "switchboard.toml";
const CONFIG_DIR_NAME = ".switchboard";
const APP_NAME = "switchboard";
const REGISTRY_FILENAME = "servers.json";
const CATALOG_FILENAME = "tool_catalog.json";

function getEnv(key: string): string | undefined {
  return process.env[key];
}

function getXdgConfigHome(): string {
  return getEnv("XDG_CONFIG_HOME") || join(homedir(), ".config");
}

function getXdgCacheHome(): string {
  return getEnv("XDG_CACHE_HOME") || join(homedir(), ".cache");
}

/**
 * Gets the user-level configuration directory.
 * Uses XDG_CONFIG_HOME on Unix, APPDATA on Windows.
 */
export function getUserConfigDir(): string {
  if (platform() === "win32") {
    return join(
      getEnv("APPDATA") || join(homedir(), "AppData", "Roaming"),
      APP_NAME,
    );
  }
  return join(getXdgConfigHome(), APP_NAME);
}

/**
 * Gets the user-level cache directory.
 * Uses XDG_CACHE_HOME on Unix, LOCALAPPDATA on Windows.
 */
export function getUserCacheDir(): string {
  if (platform() === "win32") {
    return join(
      getEnv("LOCALAPPDATA") || join(homedir(), "AppData", "Local"),
      APP_NAME,
      "Cache",
    );
  }
  return join(getXdgCacheHome(), APP_NAME);
}

export function getDefaultRegistryPath(): string {
  return join(getUserConfigDir(), REGISTRY_FILENAME);
}

export function getDefaultCatalogPath(): string {
  return join(getUserCacheDir(), CATALOG_FILENAME);
}

/**
 * Searches up the directory tree for a project-level settings file.
 * @internal
 */
function findProjectConfig(startDir: string): string | null {
  let currentDir = resolve(startDir);

  while (true) {
    const directPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(directPath)) {
      return directPath;
    }

    const hiddenDirPath = join(currentDir, CONFIG_DIR_NAME, "config.toml");
    if (existsSync(hiddenDirPath)) {
      return hiddenDirPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) break;
    currentDir = parentDir;
  }

  return null;
}

/**
 * Discovers the settings file path using multi-scope discovery.
 *
 * @param cwd - Working directory to start project search from
 * @returns Path and source if found, null if no settings file exists
 */
export function discoverConfigPath(
  cwd: string = process.cwd(),
): ConfigPathResult | null {
  const envPath = getEnv("SWITCHBOARD_CONFIG");
  if (envPath) {
    const resolvedEnvPath = resolve(envPath);
    if (existsSync(resolvedEnvPath)) {
      return { path: resolvedEnvPath, source: "env" };
    }
  }

  const projectPath = findProjectConfig(cwd);
  if (projectPath) {
    return { path: projectPath, source: "project" };
  }

  const userPath = join(getUserConfigDir(), "config.toml");
  if (existsSync(userPath)) {
    return { path: userPath, source: "user" };
  }

  return null;
}

/**
 * Ensures the parent directory of a file exists.
 */
export function ensureParentDir(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

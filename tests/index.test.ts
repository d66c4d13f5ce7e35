import { writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { parseArgs } from "../src/cli/index.js";
import { createRuntime, resolveLogLevel } from "../src/index.js";
import { getLogLevel, setLogLevel } from "../src/utils/logger.js";
import { createTempDir, type TempDir } from "./helpers/temp-dir.js";

describe("resolveLogLevel", () => {
  test("the environment overrides the settings file", () => {
    expect(resolveLogLevel("info", { SWITCHBOARD_LOG_LEVEL: "debug" })).toBe("debug");
  });

  test("unknown or missing values keep the settings level", () => {
    expect(resolveLogLevel("warn", { SWITCHBOARD_LOG_LEVEL: "loud" })).toBe("warn");
    expect(resolveLogLevel("warn", {})).toBe("warn");
  });
});

describe("createRuntime", () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = createTempDir();
    vi.stubEnv("SWITCHBOARD_LOG_LEVEL", "");
  });

  afterEach(() => {
    setLogLevel("info");
    vi.unstubAllEnvs();
    temp.cleanup();
  });

  test("wires the settings file into the registry and catalog", () => {
    const config = temp.path("switchboard.toml");
    writeFileSync(
      config,
      [
        "[registry]",
        'path = "servers.json"',
        "watch = false",
        "[catalog]",
        'path = "catalog.json"',
        "[operations.logging]",
        'level = "warn"',
      ].join("\n"),
    );

    const runtime = createRuntime(parseArgs(["list", "--config", config]));

    expect(runtime.config.source).toBe("cli");
    expect(runtime.registry.filePath).toBe(temp.path("servers.json"));
    expect(runtime.registry.format).toBe("nested");
    expect(runtime.catalog.filePath).toBe(temp.path("catalog.json"));
    expect(getLogLevel()).toBe("warn");
  });

  test("command-line flags override the registry path and layout", () => {
    const config = temp.path("switchboard.toml");
    writeFileSync(config, '[catalog]\npath = "catalog.json"\n');
    const registryPath = temp.path("elsewhere", "servers.json");

    const runtime = createRuntime(
      parseArgs(["--config", config, "--registry", registryPath, "--legacy-format"]),
    );

    expect(runtime.registry.filePath).toBe(registryPath);
    expect(runtime.registry.format).toBe("legacy");
  });
});

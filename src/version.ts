import { readFileSync } from "node:fs";

interface PackageManifest {
  version?: unknown;
}

interface ResolveVersionOptions {
  env?: NodeJS.ProcessEnv;
  fallbackVersion?: string;
  /** Candidate manifest locations, tried in order */
  manifestUrls?: URL[];
  readManifest?: (manifestUrl: URL) => PackageManifest;
}

function normalizeVersion(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readManifestFile(manifestUrl: URL): PackageManifest {
  const raw = readFileSync(manifestUrl, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
    return { version: parsed.version };
  }
  return {};
}

/**
 * Sources run from `src/`, compiled output from `dist/src/`, so the
 * manifest sits one or two levels up.
 */
function defaultManifestUrls(): URL[] {
  return [
    new URL("../package.json", import.meta.url),
    new URL("../../package.json", import.meta.url),
  ];
}

export function resolveVersion(options: ResolveVersionOptions = {}): string {
  const readManifest = options.readManifest ?? readManifestFile;
  const candidates = options.manifestUrls ?? defaultManifestUrls();

  for (const manifestUrl of candidates) {
    let manifest: PackageManifest;
    try {
      manifest = readManifest(manifestUrl);
    } catch {
      continue;
    }
    const manifestVersion = normalizeVersion(manifest.version);
    if (manifestVersion) {
      return manifestVersion;
    }
  }

  const envVersion = normalizeVersion(
    (options.env ?? process.env)["npm_package_version"],
  );
  if (envVersion) {
    return envVersion;
  }

  return normalizeVersion(options.fallbackVersion) ?? "0.0.0";
}

/** Current package version, resolved from package metadata. */
export const VERSION = resolveVersion();

/**
 * Whole-file JSON persistence helpers shared by the registry and catalog.
 *
 * Writes go to a sibling temp file first and are renamed into place, so a
 * reader never observes a half-written document.
 *
 * @module utils/json-file
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { rename, writeFile } from "node:fs/promises";
import { ensureParentDir } from "../config/paths.js";
import { PersistenceError } from "../errors.js";

let tmpCounter = 0;

function tmpPathFor(filePath: string): string {
  tmpCounter += 1;
  return `${filePath}.${process.pid}.${tmpCounter}.tmp`;
}

/**
 * Reads and parses a JSON file.
 *
 * @returns The parsed document, or undefined when the file does not exist
 * @throws PersistenceError if the file cannot be read or parsed
 */
export function readJsonFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    return undefined;
  }
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new PersistenceError(filePath, "read", err);
  }
}

/**
 * Synchronously replaces a JSON file.
 *
 * @returns The text written
 * @throws PersistenceError if the write fails
 */
export function writeJsonFileSync(filePath: string, data: unknown): string {
  const tmp = tmpPathFor(filePath);
  const text = `${JSON.stringify(data, null, 2)}\n`;
  try {
    ensureParentDir(filePath);
    writeFileSync(tmp, text, "utf-8");
    renameSync(tmp, filePath);
    return text;
  } catch (err) {
    throw new PersistenceError(filePath, "write", err);
  }
}

/**
 * Serializes asynchronous whole-file writes to one path.
 *
 * Each queued write takes its snapshot when it runs, not when it is
 * queued, so the last write to land always carries the latest state.
 */
export class SerializedJsonWriter {
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /**
   * Queues a write of `snapshot()` behind any write already in flight.
   *
   * @returns Promise settling once this write has landed
   * @throws PersistenceError if this write fails
   */
  write(snapshot: () => unknown): Promise<void> {
    const next = this.chain.then(async () => {
      const tmp = tmpPathFor(this.filePath);
      try {
        ensureParentDir(this.filePath);
        await writeFile(
          tmp,
          `${JSON.stringify(snapshot(), null, 2)}\n`,
          "utf-8",
        );
        await rename(tmp, this.filePath);
      } catch (err) {
        throw new PersistenceError(this.filePath, "write", err);
      }
    });
    // A failed write must not wedge the writes queued after it.
    this.chain = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.chain;
  }
}

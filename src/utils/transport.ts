import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { createLogger } from "./logger.js";

const log = createLogger("transport");

/** How long a subprocess gets after SIGTERM before SIGKILL */
const KILL_GRACE_MS = 2000;
const EXIT_POLL_MS = 50;

/**
 * Closes an MCP transport and makes sure a stdio subprocess is gone
 * afterwards. Close errors are logged, never thrown.
 */
export async function safelyCloseTransport(transport: Transport): Promise<void> {
  const pid =
    transport instanceof StdioClientTransport ? transport.pid : null;

  try {
    await transport.close();
  } catch (err) {
    log.warn("Transport close warning", err);
  }

  if (pid !== null && isProcessAlive(pid)) {
    await terminateProcess(pid);
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms).unref();
  });
}

/**
 * Sends SIGTERM, waits up to the grace period, then escalates to SIGKILL.
 */
async function terminateProcess(pid: number): Promise<void> {
  try {
    process.kill(pid, "SIGTERM");
  } catch (err) {
    log.debug(`Process ${pid} already gone: ${String(err)}`);
    return;
  }

  const deadline = Date.now() + KILL_GRACE_MS;
  while (Date.now() < deadline) {
    if (!isProcessAlive(pid)) return;
    await sleep(EXIT_POLL_MS);
  }

  try {
    process.kill(pid, "SIGKILL");
  } catch (err) {
    log.debug(`Process ${pid} exited before SIGKILL: ${String(err)}`);
  }
}

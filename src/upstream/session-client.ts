/**
 * Handle bound to one live upstream session.
 *
 * @module upstream/session-client
 */

import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  type CallToolResult,
  CallToolResultSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { ToolDescriptor } from "../catalog/types.js";
import { ExecutionFailedError } from "../errors.js";

export type ToolCallResult = CallToolResult;

/**
 * Lists and calls tools on the session it was created for. Obtained from
 * {@link ConnectionManager.getClient}; never constructed by callers.
 */
export class SessionClient {
  constructor(
    readonly serverName: string,
    private readonly client: Client,
    private readonly liveCheck: () => boolean,
  ) {}

  /** Local state check, no I/O */
  isConnected(): boolean {
    return this.liveCheck();
  }

  /**
   * Fetches the server's current tool list, following pagination cursors.
   */
  async listTools(): Promise<ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.client.listTools(
        cursor === undefined ? undefined : { cursor },
      );
      for (const tool of page.tools) {
        tools.push({
          name: tool.name,
          description: tool.description,
          inputSchema: { ...tool.inputSchema },
        });
      }
      cursor = page.nextCursor;
    } while (cursor !== undefined);
    return tools;
  }

  /**
   * Invokes a remote tool. A result with `isError` set is returned as is;
   * only a thrown failure becomes an error.
   *
   * @throws ExecutionFailedError if the call throws
   */
  async callTool(
    actionName: string,
    params: Record<string, unknown>,
  ): Promise<ToolCallResult> {
    try {
      return await this.client.request(
        {
          method: "tools/call",
          params: { name: actionName, arguments: params },
        },
        CallToolResultSchema,
      );
    } catch (err) {
      throw new ExecutionFailedError(this.serverName, actionName, err);
    }
  }
}

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  ExecutionFailedError,
  HandshakeFailedError,
  NotConnectedError,
} from "../src/errors.js";
import type { ServerDefinition } from "../src/registry/schema.js";
import { ConnectionManager } from "../src/upstream/connection-manager.js";
import { FakeUpstreams, tool } from "./fixtures/fake-upstreams.js";

function stdio(name: string): ServerDefinition {
  return {
    name,
    transport: "stdio",
    command: `${name}-mcp`,
    args: [],
    env: {},
    enabled: true,
  };
}

describe("ConnectionManager", () => {
  let fakes: FakeUpstreams;
  let manager: ConnectionManager;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    fakes = new FakeUpstreams()
      .add("nlp", [tool("translate_text", "Translate text"), tool("summarize")])
      .add("weather", [tool("get_forecast")]);
    manager = new ConnectionManager({ transportFactory: fakes.factory });
  });

  afterEach(async () => {
    await manager.disconnectAll();
    vi.restoreAllMocks();
  });

  describe("connect", () => {
    test("returns immediately with a connecting acknowledgement", async () => {
      const ack = manager.connect(stdio("nlp"));

      expect(ack).toEqual({ server: "nlp", state: "connecting", initiated: true });
      expect(manager.getState("nlp")).toBe("connecting");
      expect(manager.isLive("nlp")).toBe(true);
      expect(manager.isConnected("nlp")).toBe(false);

      await vi.waitFor(() => expect(manager.isConnected("nlp")).toBe(true));
      expect(manager.getState("nlp")).toBe("connected");
    });

    test("a second connect while connecting does not start another session", async () => {
      manager.connect(stdio("nlp"));
      const second = manager.connect(stdio("nlp"));

      expect(second).toEqual({ server: "nlp", state: "connecting", initiated: false });
      await manager.connectAndWait(stdio("nlp"));
      expect(fakes.created).toEqual(["nlp"]);
    });

    test("connect on a connected server reports connected", async () => {
      await manager.connectAndWait(stdio("nlp"));
      expect(manager.connect(stdio("nlp"))).toEqual({
        server: "nlp",
        state: "connected",
        initiated: false,
      });
      expect(fakes.created).toEqual(["nlp"]);
    });

    test("connectAndWait resolves with a usable client", async () => {
      const client = await manager.connectAndWait(stdio("nlp"));

      expect(client.serverName).toBe("nlp");
      expect(client.isConnected()).toBe(true);
      expect(manager.getClient("nlp")).toBe(client);
    });

    test("a failed handshake is recorded and removed from the live set", async () => {
      fakes.fail("nlp", "spawn nlp-mcp ENOENT");

      await expect(manager.connectAndWait(stdio("nlp"))).rejects.toThrow(
        HandshakeFailedError,
      );
      expect(manager.isLive("nlp")).toBe(false);
      expect(manager.getState("nlp")).toBe("failed");
      expect(manager.getStatus().get("nlp")).toEqual({
        state: "failed",
        error: "Failed to connect to server 'nlp': spawn nlp-mcp ENOENT",
      });
    });

    test("a background failure settles without the caller waiting", async () => {
      fakes.fail("weather", "boom");
      manager.connect(stdio("weather"));

      await vi.waitFor(() => expect(manager.getState("weather")).toBe("failed"));
      expect(() => manager.getClient("weather")).toThrow(NotConnectedError);
    });

    test("a failed server can be connected again", async () => {
      fakes.fail("nlp", "not yet");
      await expect(manager.connectAndWait(stdio("nlp"))).rejects.toThrow("not yet");

      fakes.recover("nlp");
      await manager.connectAndWait(stdio("nlp"));
      expect(manager.getState("nlp")).toBe("connected");
      expect(manager.getStatus().get("nlp")).toEqual({
        state: "connected",
        error: undefined,
      });
    });
  });

  describe("getClient", () => {
    test("throws for servers never connected", () => {
      expect(() => manager.getClient("nlp")).toThrow(
        "Server 'nlp' is not connected",
      );
      expect(manager.getState("nlp")).toBe("absent");
    });

    test("throws while the handshake is still running", async () => {
      manager.connect(stdio("nlp"));
      expect(() => manager.getClient("nlp")).toThrow(NotConnectedError);
      await manager.connectAndWait(stdio("nlp"));
    });
  });

  describe("disconnect", () => {
    test("closes the session and forgets the client", async () => {
      const client = await manager.connectAndWait(stdio("nlp"));

      expect(await manager.disconnect("nlp")).toBe(true);
      expect(manager.getState("nlp")).toBe("closed");
      expect(manager.isLive("nlp")).toBe(false);
      expect(client.isConnected()).toBe(false);
      expect(() => manager.getClient("nlp")).toThrow(NotConnectedError);
    });

    test("is a no-op without a session", async () => {
      expect(await manager.disconnect("nlp")).toBe(false);
      expect(manager.getState("nlp")).toBe("absent");
    });

    test("waits for an in-flight handshake, then closes", async () => {
      manager.connect(stdio("nlp"));
      expect(await manager.disconnect("nlp")).toBe(true);
      expect(manager.getState("nlp")).toBe("closed");
    });

    test("reports nothing closed when the in-flight handshake fails", async () => {
      fakes.fail("nlp", "refused");
      manager.connect(stdio("nlp"));

      expect(await manager.disconnect("nlp")).toBe(false);
      expect(manager.getState("nlp")).toBe("failed");
    });

    test("disconnectAll closes every live session", async () => {
      await manager.connectAndWait(stdio("nlp"));
      await manager.connectAndWait(stdio("weather"));

      expect(await manager.disconnectAll()).toEqual(["nlp", "weather"]);
      expect(manager.listActive()).toEqual([]);
      expect(await manager.disconnectAll()).toEqual([]);
    });

    test("a reconnect after disconnect opens a new session", async () => {
      await manager.connectAndWait(stdio("nlp"));
      await manager.disconnect("nlp");
      await manager.connectAndWait(stdio("nlp"));

      expect(fakes.created).toEqual(["nlp", "nlp"]);
      expect(manager.isConnected("nlp")).toBe(true);
    });
  });

  test("a close from the server side marks the session closed", async () => {
    const client = await manager.connectAndWait(stdio("nlp"));

    await fakes.dropConnection("nlp");

    await vi.waitFor(() => expect(manager.getState("nlp")).toBe("closed"));
    expect(manager.getStatus().get("nlp")?.error).toBe(
      "connection closed by server",
    );
    expect(client.isConnected()).toBe(false);
  });
});

describe("SessionClient", () => {
  let fakes: FakeUpstreams;
  let manager: ConnectionManager;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    fakes = new FakeUpstreams();
    manager = new ConnectionManager({ transportFactory: fakes.factory });
  });

  afterEach(async () => {
    await manager.disconnectAll();
    vi.restoreAllMocks();
  });

  test("listTools follows pagination cursors", async () => {
    fakes.add(
      "big",
      ["a", "b", "c", "d", "e"].map((name) => tool(name)),
      2,
    );
    const client = await manager.connectAndWait(stdio("big"));

    const tools = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["a", "b", "c", "d", "e"]);
    expect(tools[0]?.inputSchema).toEqual({ type: "object" });
  });

  test("listTools sees the server's current tools", async () => {
    fakes.add("nlp", [tool("translate_text")]);
    const client = await manager.connectAndWait(stdio("nlp"));

    fakes.setTools("nlp", [tool("translate_text"), tool("detect_language")]);
    expect((await client.listTools()).map((t) => t.name)).toEqual([
      "translate_text",
      "detect_language",
    ]);
  });

  test("callTool forwards arguments and returns the result", async () => {
    fakes.add("nlp", [
      tool("translate_text", "Translate", (args) => ({
        content: [{ type: "text", text: `hola (${String(args["lang"])})` }],
      })),
    ]);
    const client = await manager.connectAndWait(stdio("nlp"));

    const result = await client.callTool("translate_text", {
      text: "hello",
      lang: "es",
    });

    expect(result.content).toEqual([{ type: "text", text: "hola (es)" }]);
    expect(fakes.calls).toEqual([
      {
        server: "nlp",
        name: "translate_text",
        arguments: { text: "hello", lang: "es" },
      },
    ]);
  });

  test("an isError result is returned, not thrown", async () => {
    fakes.add("nlp", [
      tool("translate_text", "Translate", () => ({
        content: [{ type: "text", text: "unsupported language" }],
        isError: true,
      })),
    ]);
    const client = await manager.connectAndWait(stdio("nlp"));

    const result = await client.callTool("translate_text", {});
    expect(result.isError).toBe(true);
  });

  test("a thrown call becomes ExecutionFailedError", async () => {
    fakes.add("nlp", [tool("translate_text")]);
    const client = await manager.connectAndWait(stdio("nlp"));

    const failure = client.callTool("no_such_tool", {});
    await expect(failure).rejects.toThrow(ExecutionFailedError);
    await expect(failure).rejects.toThrow(/unknown tool no_such_tool/);
  });
});

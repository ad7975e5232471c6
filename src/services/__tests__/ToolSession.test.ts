import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConnectionError,
  HostUnavailableError,
  NotConnectedError,
  SessionBrokenError,
} from "../../errors/index.js";
import { ToolSession } from "../ToolSession.js";
import type { TransportFactory } from "../transports.js";

const DEMO_TOOLS = ["echo", "calculator", "get_time", "text_transform"];

function linkedTo(server: McpServer): TransportFactory {
  return async () => {
    const [clientSide, hostSide] = InMemoryTransport.createLinkedPair();
    await server.connect(hostSide);
    return clientSide;
  };
}

/**
 * Starts fine, then answers every request with a JSON-RPC error
 */
class RejectingHostTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  async start(): Promise<void> {}

  async send(message: JSONRPCMessage): Promise<void> {
    if ("method" in message && "id" in message) {
      const { id } = message;
      queueMicrotask(() => {
        this.onmessage?.({ jsonrpc: "2.0", id, error: { code: -32603, message: "host refused" } });
      });
    }
  }

  async close(): Promise<void> {
    this.onclose?.();
  }
}

/**
 * Starts without touching the network and fails every send, the way an HTTP
 * transport behaves when nothing listens at its URL
 */
class SilentHostTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  async start(): Promise<void> {}

  async send(): Promise<void> {
    throw new TypeError("fetch failed");
  }

  async close(): Promise<void> {
    this.onclose?.();
  }
}

class UnreachableTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  async start(): Promise<void> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:9");
  }

  async send(): Promise<void> {}

  async close(): Promise<void> {}
}

describe("ToolSession", () => {
  const sessions: ToolSession[] = [];
  const open = (session: ToolSession) => {
    sessions.push(session);
    return session;
  };

  afterEach(async () => {
    await Promise.all(sessions.splice(0).map((session) => session.close()));
  });

  it("refuses tool access before connect", async () => {
    const session = open(new ToolSession({ transport: { type: "in-memory" } }));

    expect(() => session.listCachedTools()).toThrow(NotConnectedError);
    await expect(session.callTool("echo", { text: "hi" })).rejects.toBeInstanceOf(NotConnectedError);
    expect(session.status).toBe("idle");
  });

  it("connects to the demo host and caches its tools", async () => {
    const session = open(new ToolSession({ transport: { type: "in-memory" } }));
    await session.connect();

    expect(session.listCachedTools().map((tool) => tool.name)).toEqual(DEMO_TOOLS);
    expect(session.getTranslatedTools().declarations.map((d) => d.name)).toEqual(DEMO_TOOLS);
    expect(session.getInfo()).toMatchObject({
      status: "connected",
      transport: "in-memory://demo",
      transportType: "in-memory",
      toolCount: 4,
    });
  });

  it("lists tools once no matter how often connect is called", async () => {
    const listTools = vi.spyOn(Client.prototype, "listTools");
    const session = open(new ToolSession({ transport: { type: "in-memory" } }));

    await Promise.all([session.connect(), session.connect()]);
    await session.connect();
    session.listCachedTools();
    session.getTranslatedTools();

    expect(listTools).toHaveBeenCalledTimes(1);
  });

  it("returns tool output as text segments", async () => {
    const session = open(new ToolSession({ transport: { type: "in-memory" } }));
    await session.connect();

    const result = await session.callTool("echo", { text: "hello" });

    expect(result).toMatchObject({ status: "success", content: ["hello"] });
  });

  it("reports a tool-side error as a result value", async () => {
    const session = open(new ToolSession({ transport: { type: "in-memory" } }));
    await session.connect();

    const result = await session.callTool("calculator", { operation: "divide", a: 1, b: 0 });

    expect(result).toMatchObject({ status: "error", error: "Cannot divide by zero", code: "TOOL_CALL_FAILED" });
    expect(session.status).toBe("connected");
  });

  it("reports an unknown tool without contacting the host", async () => {
    const session = open(new ToolSession({ transport: { type: "in-memory" } }));
    await session.connect();

    const result = await session.callTool("nope", {});

    expect(result).toEqual({
      status: "error",
      error: "Tool 'nope' not found. Available tools: echo, calculator, get_time, text_transform",
      code: "TOOL_NOT_FOUND",
      durationMs: 0,
    });
  });

  it("reports a slow tool as timed out", async () => {
    const server = new McpServer({ name: "slow-host", version: "1.0.0" });
    server.tool("slow", "Takes its time", async () => {
      await new Promise((resolve) => setTimeout(resolve, 300));
      return { content: [{ type: "text", text: "late" }] };
    });
    const session = open(
      new ToolSession({ transport: { type: "in-memory" }, transportFactory: linkedTo(server), toolCallTimeoutMs: 20 })
    );
    await session.connect();

    const result = await session.callTool("slow", {});

    expect(result.status).toBe("error");
    expect(result.status === "error" && result.code).toBe("TOOL_CALL_TIMEOUT");
  });

  it("can be closed repeatedly", async () => {
    const session = open(new ToolSession({ transport: { type: "in-memory" } }));
    await session.connect();

    await session.close();
    await session.close();

    expect(session.status).toBe("closed");
    await expect(session.callTool("echo", { text: "x" })).rejects.toBeInstanceOf(NotConnectedError);
  });

  it("fails with HostUnavailableError when the channel cannot start", async () => {
    const session = open(
      new ToolSession({
        transport: { type: "sse", url: "http://127.0.0.1:9/sse" },
        transportFactory: async () => new UnreachableTransport(),
      })
    );

    await expect(session.connect()).rejects.toBeInstanceOf(HostUnavailableError);
    expect(session.status).toBe("idle");
  });

  it("fails with HostUnavailableError when the host never answers the handshake", async () => {
    const session = open(
      new ToolSession({
        transport: { type: "streamable-http", url: "http://127.0.0.1:9/mcp" },
        transportFactory: async () => new SilentHostTransport(),
      })
    );

    await expect(session.connect()).rejects.toBeInstanceOf(HostUnavailableError);
    expect(session.status).toBe("idle");
  });

  it("fails with HostUnavailableError when nothing listens at a streamable HTTP URL", async () => {
    const session = open(new ToolSession({ transport: { type: "streamable-http", url: "http://127.0.0.1:9/mcp" } }));

    await expect(session.connect()).rejects.toBeInstanceOf(HostUnavailableError);
  });

  it("stays closed when close() runs while a failing connect is in flight", async () => {
    const slowRefusal: Transport = {
      start: () => new Promise((_resolve, reject) => setTimeout(() => reject(new Error("connect ECONNREFUSED")), 10)),
      send: () => Promise.resolve(),
      close: () => Promise.resolve(),
    };
    const session = open(
      new ToolSession({ transport: { type: "in-memory" }, transportFactory: async () => slowRefusal })
    );

    const connecting = session.connect();
    await session.close();

    await expect(connecting).rejects.toBeInstanceOf(HostUnavailableError);
    expect(session.status).toBe("closed");
  });

  it("fails with HostUnavailableError for an unusable URL", async () => {
    const session = open(new ToolSession({ transport: { type: "streamable-http", url: "not a url" } }));

    await expect(session.connect()).rejects.toThrow("Invalid tool host URL: not a url");
  });

  it("fails with ConnectionError when the handshake is rejected", async () => {
    const session = open(
      new ToolSession({
        transport: { type: "in-memory" },
        transportFactory: async () => new RejectingHostTransport(),
      })
    );

    await expect(session.connect()).rejects.toBeInstanceOf(ConnectionError);
    expect(session.isConnected).toBe(false);
  });

  it("marks the session broken when the host goes away", async () => {
    const server = new McpServer({ name: "fragile-host", version: "1.0.0" });
    server.tool("ping", "Replies pong", async () => ({ content: [{ type: "text", text: "pong" }] }));
    const session = open(new ToolSession({ transport: { type: "in-memory" }, transportFactory: linkedTo(server) }));
    await session.connect();

    await server.close();

    expect(session.status).toBe("broken");
    await expect(session.callTool("ping", {})).rejects.toBeInstanceOf(SessionBrokenError);
  });

  it("reconnects after the channel broke", async () => {
    const servers: McpServer[] = [];
    const factory: TransportFactory = async () => {
      const server = new McpServer({ name: "fragile-host", version: "1.0.0" });
      server.tool("ping", "Replies pong", async () => ({ content: [{ type: "text", text: "pong" }] }));
      servers.push(server);
      return linkedTo(server)({ type: "in-memory" }, "test");
    };
    const session = open(new ToolSession({ transport: { type: "in-memory" }, transportFactory: factory }));
    await session.connect();
    await servers[0].close();

    await session.connect();

    expect(session.status).toBe("connected");
    expect(await session.callTool("ping", {})).toMatchObject({ status: "success", content: ["pong"] });
  });
});

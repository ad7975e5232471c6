import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { v4 as uuidv4 } from "uuid";
import type { ToolHostTransportConfig } from "../config/index.js";
import {
  BridgeError,
  ConnectionError,
  HostUnavailableError,
  NotConnectedError,
  SessionBrokenError,
  describeError,
} from "../errors/index.js";
import type { JsonObject } from "../types/conversation.types.js";
import type { ToolCallResult, ToolListResult, ToolSpec, TranslatedToolSet } from "../types/tool.types.js";
import { translateToolSet } from "./SchemaTranslator.js";
import { ReachabilityTrackingTransport, createTransport, describeTransport, type TransportFactory } from "./transports.js";

/**
 * Session status
 */
export type SessionStatus = "idle" | "connecting" | "connected" | "broken" | "closed";

export interface ToolSessionOptions {
  transport: ToolHostTransportConfig;
  /** Upper bound for a single tool call; the MCP client rejects the request once it elapses */
  toolCallTimeoutMs?: number;
  /** Overrides how the channel is built (tests link an in-process host here) */
  transportFactory?: TransportFactory;
  clientInfo?: { name: string; version: string };
}

export interface SessionInfo {
  sessionId: string | null;
  status: SessionStatus;
  transport: string;
  transportType: ToolHostTransportConfig["type"];
  toolCount: number;
  connectedAt: Date | null;
}

interface Connection {
  client: Client;
  tools: readonly ToolSpec[];
  translated: TranslatedToolSet;
}

const DEFAULT_CLIENT_INFO = { name: "tool-bridge-gateway", version: "1.0.0" };

function toToolSpec(tool: Tool): ToolSpec {
  return {
    name: tool.name,
    description: tool.description ?? "",
    parameterSchema: tool.inputSchema,
  };
}

/**
 * Text segments of a tool result. Non-text content is serialized.
 */
function extractText(content: unknown): string[] {
  if (!Array.isArray(content)) {
    return content === undefined ? [] : [JSON.stringify(content)];
  }

  return content.map((item: unknown) => {
    if (typeof item === "object" && item !== null && "text" in item && typeof item.text === "string") {
      return item.text;
    }
    return JSON.stringify(item);
  });
}

/**
 * ToolSession - owns the connection to one Tool Host
 *
 * Connects lazily and at most once, lists the tools a single time per
 * connection and caches their translated declarations. Tool-side failures
 * come back as `ToolCallResult` values; only a dead channel throws.
 */
export class ToolSession {
  private connection: Connection | null = null;
  private connecting: Promise<void> | null = null;
  private sessionStatus: SessionStatus = "idle";
  private sessionId: string | null = null;
  private connectedAt: Date | null = null;

  private readonly transportFactory: TransportFactory;
  private readonly clientInfo: { name: string; version: string };

  constructor(private readonly options: ToolSessionOptions) {
    this.transportFactory = options.transportFactory ?? createTransport;
    this.clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;
  }

  get status(): SessionStatus {
    return this.sessionStatus;
  }

  get isConnected(): boolean {
    return this.sessionStatus === "connected";
  }

  /**
   * Connect, handshake, list tools and translate them.
   * A second call on a connected session is a no-op; concurrent callers share
   * the attempt already in flight.
   */
  async connect(): Promise<void> {
    if (this.sessionStatus === "connected") {
      return;
    }
    if (this.connecting) {
      return this.connecting;
    }

    this.connecting = this.establish().finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  private async establish(): Promise<void> {
    if (this.connection) {
      // a broken session is torn down before reconnecting
      await this.release();
    }

    const sessionId = uuidv4();
    const label = sessionId.slice(0, 8);
    const target = describeTransport(this.options.transport);
    this.sessionStatus = "connecting";
    console.log(`[ToolSession] Connecting via ${this.options.transport.type} to ${target} (Session: ${sessionId})`);

    let transport: ReachabilityTrackingTransport;
    try {
      transport = new ReachabilityTrackingTransport(await this.transportFactory(this.options.transport, label));
    } catch (error) {
      this.abandonAttempt();
      console.error(`[ToolSession] Failed to create transport:`, error);
      if (error instanceof BridgeError) {
        throw error;
      }
      throw new HostUnavailableError(`Failed to create transport: ${describeError(error)}`, error);
    }

    const client = new Client(this.clientInfo, { capabilities: {} });
    client.onerror = (error) => {
      console.error(`[ToolSession] Transport error (Session: ${sessionId}):`, error);
    };

    try {
      await client.connect(transport);
    } catch (error) {
      this.abandonAttempt();
      await this.closeQuietly(client);
      console.error(`[ToolSession] Connection failed (Session: ${sessionId}):`, error);
      if (!transport.heardFromHost) {
        throw new HostUnavailableError(`Tool host unavailable at ${target}: ${describeError(error)}`, error);
      }
      throw new ConnectionError(`Handshake with tool host failed: ${describeError(error)}`, error);
    }

    let listing: ToolListResult;
    try {
      listing = await this.discoverTools(client);
    } catch (error) {
      this.abandonAttempt();
      await this.closeQuietly(client);
      console.error(`[ToolSession] Tool discovery failed (Session: ${sessionId}):`, error);
      throw new ConnectionError(`Failed to list tools: ${describeError(error)}`, error);
    }

    if (this.sessionStatus !== "connecting") {
      // close() ran while the handshake was in flight
      await this.closeQuietly(client);
      throw new NotConnectedError("Tool session was closed while connecting");
    }

    const { tools, translated } = listing;
    this.connection = { client, tools, translated };
    this.sessionId = sessionId;
    this.connectedAt = new Date();
    this.sessionStatus = "connected";

    client.onclose = () => {
      if (this.connection?.client === client && this.sessionStatus === "connected") {
        console.error(`[ToolSession] Channel closed unexpectedly (Session: ${sessionId})`);
        this.sessionStatus = "broken";
      }
    };

    console.log(`[ToolSession] Session ${sessionId} ready with ${translated.declarations.length} translated tools`);
  }

  /**
   * A failed attempt leaves the session retryable, unless close() ran meanwhile
   */
  private abandonAttempt(): void {
    if (this.sessionStatus === "connecting") {
      this.sessionStatus = "idle";
    }
  }

  /**
   * One listTools round trip, translated into model declarations
   */
  private async discoverTools(client: Client): Promise<ToolListResult> {
    const response = await client.listTools();
    const tools = Object.freeze(response.tools.map(toToolSpec));
    const translated = translateToolSet(tools);

    console.log(
      `[ToolSession] Discovered ${tools.length} tools: ${tools.map((t) => t.name).join(", ")}` +
        (translated.diagnostics.length > 0 ? ` (${translated.diagnostics.length} schema diagnostic(s))` : "")
    );
    return { tools, translated };
  }

  private requireConnection(): Connection {
    if (this.sessionStatus === "broken") {
      throw new SessionBrokenError("Tool host channel is closed; reconnect before reuse");
    }
    if (this.sessionStatus !== "connected" || !this.connection) {
      throw new NotConnectedError();
    }
    return this.connection;
  }

  /**
   * Tools as listed at connect time
   */
  listCachedTools(): readonly ToolSpec[] {
    return this.requireConnection().tools;
  }

  getTranslatedTools(): TranslatedToolSet {
    return this.requireConnection().translated;
  }

  /**
   * Execute a tool on the Tool Host.
   *
   * @throws NotConnectedError before connect or after close
   * @throws SessionBrokenError when the channel dies
   */
  async callTool(name: string, args: JsonObject): Promise<ToolCallResult> {
    const { client, tools } = this.requireConnection();
    const startTime = Date.now();

    if (!tools.some((tool) => tool.name === name)) {
      return {
        status: "error",
        error: `Tool '${name}' not found. Available tools: ${tools.map((t) => t.name).join(", ")}`,
        code: "TOOL_NOT_FOUND",
        durationMs: 0,
      };
    }

    console.log(`[ToolSession] Calling tool '${name}' via ${this.options.transport.type} (Session: ${this.sessionId})`);

    try {
      const result = await client.callTool({ name, arguments: args }, undefined, {
        timeout: this.options.toolCallTimeoutMs,
      });
      const durationMs = Date.now() - startTime;
      const content = extractText(result.content);

      if (result.isError === true) {
        console.warn(`[ToolSession] Tool '${name}' returned an error:`, content.join("\n"));
        return {
          status: "error",
          error: content.join("\n") || `Tool '${name}' reported an error`,
          code: "TOOL_CALL_FAILED",
          durationMs,
        };
      }

      console.log(`[ToolSession] Tool '${name}' executed in ${durationMs}ms`);
      return { status: "success", content, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;

      if (error instanceof McpError && error.code === ErrorCode.ConnectionClosed) {
        if (this.sessionStatus === "connected") {
          this.sessionStatus = "broken";
        }
        console.error(`[ToolSession] Channel lost during '${name}':`, error.message);
        throw new SessionBrokenError(`Tool host channel closed during '${name}'`, error);
      }

      if (error instanceof McpError && error.code === ErrorCode.RequestTimeout) {
        console.warn(`[ToolSession] Tool '${name}' timed out after ${durationMs}ms`);
        return {
          status: "error",
          error: `Tool '${name}' timed out after ${durationMs}ms`,
          code: "TOOL_CALL_TIMEOUT",
          durationMs,
        };
      }

      console.warn(`[ToolSession] Tool '${name}' failed:`, describeError(error));
      return {
        status: "error",
        error: describeError(error),
        code: "TOOL_CALL_FAILED",
        durationMs,
      };
    }
  }

  /**
   * Release the channel. Safe to call repeatedly and while a call is
   * outstanding; never throws.
   */
  async close(): Promise<void> {
    if (this.sessionStatus === "closed" && !this.connection) {
      return;
    }
    this.sessionStatus = "closed";
    await this.release();
  }

  private async release(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.sessionId = null;
    this.connectedAt = null;

    if (connection) {
      console.log(`[ToolSession] Disconnecting ${this.options.transport.type} session`);
      await this.closeQuietly(connection.client);
    }
  }

  private async closeQuietly(client: Client): Promise<void> {
    try {
      await client.close();
    } catch (error) {
      console.warn("[ToolSession] Error while closing channel:", describeError(error));
    }
  }

  getInfo(): SessionInfo {
    return {
      sessionId: this.sessionId,
      status: this.sessionStatus,
      transport: describeTransport(this.options.transport),
      transportType: this.options.transport.type,
      toolCount: this.connection?.tools.length ?? 0,
      connectedAt: this.connectedAt,
    };
  }
}

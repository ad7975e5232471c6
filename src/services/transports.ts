import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { StdioTransportConfig, ToolHostTransportConfig } from "../config/index.js";
import { HostUnavailableError, describeError } from "../errors/index.js";
import { createDemoToolHost } from "../host/demoToolHost.js";

/**
 * Builds the client side of the channel to a Tool Host
 */
export type TransportFactory = (config: ToolHostTransportConfig, label: string) => Promise<Transport>;

/**
 * Human readable target, for logs and the status endpoint
 */
export function describeTransport(config: ToolHostTransportConfig): string {
  switch (config.type) {
    case "sse":
    case "streamable-http":
      return config.url;
    case "stdio":
      return `stdio://${[config.command, ...(config.args ?? [])].join(" ")}`;
    case "in-memory":
      return "in-memory://demo";
  }
}

function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch {
    throw new HostUnavailableError(`Invalid tool host URL: ${url}`);
  }
}

function createStdioTransport(config: StdioTransportConfig, label: string): Transport {
  const transport = new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: config.env,
    cwd: config.cwd,
    stderr: "pipe",
  });

  // stderr is available before start()
  transport.stderr?.on("data", (data: Buffer) => {
    console.log(`[ToolHost] [${label}] stderr: ${data.toString().trim()}`);
  });

  return transport;
}

/**
 * Default factory: one transport per supported config type. The in-memory
 * variant starts the demonstration host and links it to the returned side.
 */
export const createTransport: TransportFactory = async (config, label) => {
  try {
    switch (config.type) {
      case "stdio":
        return createStdioTransport(config, label);
      case "sse":
        return new SSEClientTransport(parseUrl(config.url));
      case "streamable-http":
        return new StreamableHTTPClientTransport(parseUrl(config.url));
      case "in-memory": {
        const [clientSide, hostSide] = InMemoryTransport.createLinkedPair();
        await createDemoToolHost().connect(hostSide);
        return clientSide;
      }
    }
  } catch (error) {
    if (error instanceof HostUnavailableError) {
      throw error;
    }
    throw new HostUnavailableError(`Failed to create ${config.type} transport: ${describeError(error)}`, error);
  }
};

/**
 * Delegating transport that records whether the host ever answered.
 * Some transports (streamable HTTP) open no connection in start(), so a host
 * that cannot be reached only shows up as a failed first request.
 */
export class ReachabilityTrackingTransport implements Transport {
  private answered = false;

  onclose?: Transport["onclose"];
  onerror?: Transport["onerror"];
  onmessage?: Transport["onmessage"];

  constructor(private readonly inner: Transport) {}

  /** True once any message arrived from the host */
  get heardFromHost(): boolean {
    return this.answered;
  }

  get sessionId(): string | undefined {
    return this.inner.sessionId;
  }

  async start(): Promise<void> {
    this.inner.onclose = () => this.onclose?.();
    this.inner.onerror = (error) => this.onerror?.(error);
    this.inner.onmessage = (...args) => {
      this.answered = true;
      this.onmessage?.(...args);
    };
    await this.inner.start();
  }

  send(...args: Parameters<Transport["send"]>): Promise<void> {
    return this.inner.send(...args);
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  setProtocolVersion(version: string): void {
    this.inner.setProtocolVersion?.(version);
  }
}

/**
 * MCP Client - Wrapper around the official MCP SDK for talking to the server under test
 *
 * This client:
 * 1. Uses the official @modelcontextprotocol/sdk Client API
 * 2. Connects over Streamable HTTP, falling back to the legacy SSE transport
 * 3. Forwards the run's headers (auth, API keys) on every request
 * 4. Returns raw `tools/list` pages so discovery can validate them itself
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";
import { ConnectionError, describeError } from "../core/errors.js";
import type { RunConfig } from "../core/types.js";
import { logDebug } from "../utils/logger.js";

export const DEFAULT_CONNECT_TIMEOUT_MS = 60_000;

const CLIENT_INFO = { name: "mcp-tool-tester", version: "0.1.0" };

// Discovery validates pages itself, so the SDK only needs to hand back an object
const rawPageSchema = z.object({}).passthrough();

/**
 * The narrow connection surface the tester needs from an MCP server.
 */
export interface McpConnection {
  /** Raw result of one `tools/list` request */
  listToolsPage(cursor?: string): Promise<unknown>;
  /** Raw result of `tools/call`; throws on transport or JSON-RPC errors */
  callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
  close(): Promise<void>;
}

export interface ConnectOptions {
  /** Timeout for the initialize handshake on each transport attempt */
  connectTimeoutMs?: number;
}

export type McpConnector = (config: RunConfig, options?: ConnectOptions) => Promise<McpConnection>;

type TransportKind = "http" | "sse" | "custom";

/**
 * MCP Client wrapper using official SDK
 */
export class MCPClient implements McpConnection {
  private client: Client | null = null;
  private transportKind: TransportKind | null = null;

  constructor(
    private readonly config: RunConfig,
    private readonly options: ConnectOptions = {}
  ) {}

  get connected(): boolean {
    return this.client !== null;
  }

  /**
   * Connect to the server at config.mcpUrl. Streamable HTTP is tried first;
   * servers that only speak the older HTTP+SSE transport get a second attempt.
   */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    const url = new URL(this.config.mcpUrl);
    const requestInit: RequestInit = { headers: { ...this.config.headers } };

    try {
      logDebug(`Connecting over Streamable HTTP to ${url.href}`, { component: "MCP Client" });
      await this.connectTransport(new StreamableHTTPClientTransport(url, { requestInit }), "http");
      return;
    } catch (httpError) {
      logDebug(`Streamable HTTP failed, falling back to SSE: ${describeError(httpError)}`, {
        component: "MCP Client",
      });

      try {
        await this.connectTransport(new SSEClientTransport(url, { requestInit }), "sse");
      } catch (sseError) {
        throw new ConnectionError(
          `Could not connect to MCP server at ${this.config.mcpUrl}: ${describeError(sseError)} ` +
            `(Streamable HTTP attempt: ${describeError(httpError)})`,
          { cause: sseError }
        );
      }
    }
  }

  /**
   * Connect over an already-built transport. Used by connect() and by callers
   * that own their transport, such as in-process servers.
   */
  async connectTransport(transport: Transport, kind: TransportKind = "custom"): Promise<void> {
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(transport, {
      timeout: this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    });
    this.client = client;
    this.transportKind = kind;
    logDebug(`Connected to ${this.config.mcpUrl}`, { component: "MCP Client", transport: kind });
  }

  async listToolsPage(cursor?: string): Promise<unknown> {
    const client = this.requireClient();
    return client.request(
      { method: "tools/list", params: cursor === undefined ? {} : { cursor } },
      rawPageSchema
    );
  }

  async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const client = this.requireClient();

    logDebug(`Invoking tool: ${name}`, {
      component: "MCP Client",
      transport: this.transportKind,
      argsSize: JSON.stringify(args).length,
    });

    try {
      const response = await client.callTool({ name, arguments: args }, undefined, { signal });

      logDebug(`Tool completed: ${name}`, {
        component: "MCP Client",
        transport: this.transportKind,
        isError: "isError" in response && response.isError === true,
      });

      return response;
    } catch (error) {
      logDebug(`Tool failed: ${name}`, {
        component: "MCP Client",
        transport: this.transportKind,
        error: describeError(error),
      });
      throw error;
    }
  }

  /**
   * Close the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = null;
    await client.close();
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error("Client not connected. Call connect() first.");
    }
    return this.client;
  }
}

/**
 * Default connector: opens a live connection to config.mcpUrl.
 */
export const connectMcp: McpConnector = async (config, options) => {
  const client = new MCPClient(config, options);
  await client.connect();
  return client;
};

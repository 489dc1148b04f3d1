/**
 * Tool discovery - lists every tool the server exposes and validates the payload.
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { JSONSchema7 } from "json-schema";
import { z } from "zod";
import { abortable } from "../core/abort.js";
import { ConnectionError, ProtocolError, TesterError, describeError } from "../core/errors.js";
import type { RunConfig, ToolDescriptor } from "../core/types.js";
import { logDebug, logInfo, logWarn } from "../utils/logger.js";
import { connectMcp, type McpConnection, type McpConnector } from "./mcp-client.js";

function isJsonObject(value: unknown): value is JSONSchema7 {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const discoveredToolSchema = z
  .object({
    name: z.string().min(1, "tool name must not be empty"),
    description: z.string().nullish(),
    inputSchema: z.custom<JSONSchema7>(isJsonObject, { message: "inputSchema must be a JSON Schema object" }),
  })
  .passthrough();

const toolsPageSchema = z
  .object({
    tools: z.array(discoveredToolSchema),
    nextCursor: z.string().nullish(),
  })
  .passthrough();

/**
 * JSON-RPC errors mean the server answered, just not with a tool list. Timeouts
 * and dropped connections are transport failures even though the SDK reports
 * them as McpError too.
 */
function classifyListFailure(error: unknown, mcpUrl: string): TesterError {
  if (error instanceof TesterError) {
    return error;
  }
  if (
    error instanceof McpError &&
    error.code !== ErrorCode.RequestTimeout &&
    error.code !== ErrorCode.ConnectionClosed
  ) {
    return new ProtocolError(`Server at ${mcpUrl} rejected tools/list: ${error.message}`, { cause: error });
  }
  return new ConnectionError(`Lost connection to ${mcpUrl} while listing tools: ${describeError(error)}`, {
    cause: error,
  });
}

/**
 * List all tools from the server, following `nextCursor` until the last page.
 * Returns descriptors in the order the server reported them.
 */
export async function discoverTools(
  connection: McpConnection,
  mcpUrl: string,
  signal?: AbortSignal
): Promise<ToolDescriptor[]> {
  const descriptors: ToolDescriptor[] = [];
  const seenNames = new Set<string>();
  const seenCursors = new Set<string>();
  let cursor: string | undefined;
  let page = 0;

  do {
    let payload: unknown;
    try {
      payload = await abortable(connection.listToolsPage(cursor), signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw classifyListFailure(error, mcpUrl);
    }

    const parsed = toolsPageSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
      throw new ProtocolError(`Malformed tools/list response from ${mcpUrl}: ${issues.join("; ")}`);
    }

    for (const tool of parsed.data.tools) {
      if (seenNames.has(tool.name)) {
        throw new ProtocolError(`Server at ${mcpUrl} reported tool "${tool.name}" more than once`);
      }
      seenNames.add(tool.name);
      descriptors.push(
        Object.freeze({
          name: tool.name,
          description: tool.description ?? "",
          inputSchema: tool.inputSchema,
        })
      );
    }

    page++;
    cursor = parsed.data.nextCursor ?? undefined;
    if (cursor !== undefined) {
      if (seenCursors.has(cursor)) {
        throw new ProtocolError(`Server at ${mcpUrl} repeated pagination cursor "${cursor}"`);
      }
      seenCursors.add(cursor);
    }
  } while (cursor !== undefined);

  logDebug(`Discovered ${descriptors.length} tools over ${page} page(s)`, { component: "Discovery" });
  logInfo(`Available tools: ${descriptors.map((tool) => tool.name).join(", ") || "(none)"}`, {
    component: "Discovery",
  });
  return descriptors;
}

export interface ConnectionScopeOptions {
  connector?: McpConnector;
  connectTimeoutMs?: number;
  signal?: AbortSignal;
}

async function closeQuietly(connection: McpConnection, mcpUrl: string): Promise<void> {
  try {
    await connection.close();
  } catch (error) {
    logWarn(`Failed to close connection to ${mcpUrl}: ${describeError(error)}`, { component: "Discovery" });
  }
}

/**
 * Run `fn` with an open connection to config.mcpUrl. The connection is closed
 * once `fn` settles, whichever way it settles, and also when the signal aborts
 * while the connection is still being opened.
 */
export async function withMcpConnection<T>(
  config: RunConfig,
  fn: (connection: McpConnection) => Promise<T>,
  options: ConnectionScopeOptions = {}
): Promise<T> {
  const { connector = connectMcp, connectTimeoutMs, signal } = options;
  const pending = connector(config, { connectTimeoutMs });

  let connection: McpConnection;
  try {
    connection = await abortable(pending, signal);
  } catch (error) {
    if (signal?.aborted) {
      // The handshake may still complete after we stopped waiting for it
      void pending.then(
        (late) => closeQuietly(late, config.mcpUrl),
        (lateError: unknown) =>
          logDebug(`Abandoned connection attempt failed: ${describeError(lateError)}`, { component: "Discovery" })
      );
      throw error;
    }
    if (error instanceof TesterError) {
      throw error;
    }
    throw new ConnectionError(`Could not connect to MCP server at ${config.mcpUrl}: ${describeError(error)}`, {
      cause: error,
    });
  }

  try {
    return await fn(connection);
  } finally {
    await closeQuietly(connection, config.mcpUrl);
  }
}

/**
 * Unit tests for tool discovery (discovery.ts)
 *
 * Tests cover:
 *  - pagination across several tools/list pages
 *  - malformed pages, duplicate names and repeated cursors as protocol errors
 *  - JSON-RPC errors versus transport failures while listing
 *  - connection scoping: the connection is closed however the work ends
 */

import { describe, it, expect, vi } from 'vitest';

// ── Module-level mocks ────────────────────────────────────────────────────────

vi.mock('../../src/utils/logger.js', () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ConnectionError, ProtocolError } from '../../src/core/errors.js';
import type { RunConfig } from '../../src/core/types.js';
import { discoverTools, withMcpConnection } from '../../src/mcp/discovery.js';
import type { McpConnection } from '../../src/mcp/mcp-client.js';
import { FakeConnection, TEST_URL, connectorFor } from '../helpers/fakes.js';

// ── Fixtures ──────────────────────────────────────────────────────────────────

const config: RunConfig = { mcpUrl: TEST_URL, headers: {} };
const objectSchema = { type: 'object', properties: {} };

/**
 * Connection serving pre-baked tools/list payloads keyed by cursor ('' for the first page).
 */
function pagedConnection(pages: Record<string, unknown>): McpConnection & { cursors: Array<string | undefined> } {
  const cursors: Array<string | undefined> = [];
  return {
    cursors,
    async listToolsPage(cursor?: string) {
      cursors.push(cursor);
      return pages[cursor ?? ''];
    },
    async callTool() {
      return {};
    },
    async close() {},
  };
}

function failingConnection(error: unknown): McpConnection {
  return {
    async listToolsPage() {
      throw error;
    },
    async callTool() {
      return {};
    },
    async close() {},
  };
}

// ── discoverTools ─────────────────────────────────────────────────────────────

describe('discoverTools', () => {
  it('should follow nextCursor across pages and keep server order', async () => {
    const connection = pagedConnection({
      '': { tools: [{ name: 'echo', description: 'Echo text', inputSchema: objectSchema }], nextCursor: 'page-2' },
      'page-2': { tools: [{ name: 'search', inputSchema: objectSchema }] },
    });

    const tools = await discoverTools(connection, TEST_URL);

    expect(tools).toEqual([
      { name: 'echo', description: 'Echo text', inputSchema: objectSchema },
      { name: 'search', description: '', inputSchema: objectSchema },
    ]);
    expect(connection.cursors).toEqual([undefined, 'page-2']);
  });

  it('should treat a null nextCursor as the last page', async () => {
    const connection = pagedConnection({ '': { tools: [], nextCursor: null } });

    await expect(discoverTools(connection, TEST_URL)).resolves.toEqual([]);
  });

  it('should reject a page without a tools array', async () => {
    const connection = pagedConnection({ '': { items: [] } });

    await expect(discoverTools(connection, TEST_URL)).rejects.toBeInstanceOf(ProtocolError);
  });

  it('should reject a tool without an input schema', async () => {
    const connection = pagedConnection({ '': { tools: [{ name: 'echo' }] } });

    await expect(discoverTools(connection, TEST_URL)).rejects.toThrow(
      `Malformed tools/list response from ${TEST_URL}: tools.0.inputSchema: inputSchema must be a JSON Schema object`
    );
  });

  it('should reject a tool with an empty name', async () => {
    const connection = pagedConnection({ '': { tools: [{ name: '', inputSchema: objectSchema }] } });

    await expect(discoverTools(connection, TEST_URL)).rejects.toThrow(/tools\.0\.name: tool name must not be empty/);
  });

  it('should reject a tool name reported twice', async () => {
    const connection = pagedConnection({
      '': { tools: [{ name: 'echo', inputSchema: objectSchema }], nextCursor: 'page-2' },
      'page-2': { tools: [{ name: 'echo', inputSchema: objectSchema }] },
    });

    await expect(discoverTools(connection, TEST_URL)).rejects.toThrow(
      new ProtocolError(`Server at ${TEST_URL} reported tool "echo" more than once`)
    );
  });

  it('should reject a cursor the server already sent', async () => {
    const connection = pagedConnection({
      '': { tools: [], nextCursor: 'page-2' },
      'page-2': { tools: [], nextCursor: 'page-2' },
    });

    await expect(discoverTools(connection, TEST_URL)).rejects.toThrow(
      `Server at ${TEST_URL} repeated pagination cursor "page-2"`
    );
  });

  it('should report a JSON-RPC error as a protocol error', async () => {
    const connection = failingConnection(new McpError(ErrorCode.MethodNotFound, 'Method not found'));

    await expect(discoverTools(connection, TEST_URL)).rejects.toBeInstanceOf(ProtocolError);
  });

  it('should report a request timeout as a connection error', async () => {
    const connection = failingConnection(new McpError(ErrorCode.RequestTimeout, 'Request timed out'));

    await expect(discoverTools(connection, TEST_URL)).rejects.toBeInstanceOf(ConnectionError);
  });

  it('should report a transport failure as a connection error', async () => {
    const connection = failingConnection(new Error('socket hang up'));

    await expect(discoverTools(connection, TEST_URL)).rejects.toThrow(
      new ConnectionError(`Lost connection to ${TEST_URL} while listing tools: socket hang up`)
    );
  });
});

// ── withMcpConnection ─────────────────────────────────────────────────────────

describe('withMcpConnection', () => {
  it('should close the connection after the work succeeds', async () => {
    const connection = new FakeConnection([]);

    await expect(withMcpConnection(config, async () => 'done', { connector: connectorFor(connection) })).resolves.toBe(
      'done'
    );
    expect(connection.closed).toBe(true);
  });

  it('should close the connection after the work fails', async () => {
    const connection = new FakeConnection([]);

    await expect(
      withMcpConnection(
        config,
        async () => {
          throw new Error('boom');
        },
        { connector: connectorFor(connection) }
      )
    ).rejects.toThrow('boom');
    expect(connection.closed).toBe(true);
  });

  it('should wrap a connector failure in a ConnectionError', async () => {
    const connector = async (): Promise<McpConnection> => {
      throw new Error('401 Unauthorized');
    };

    await expect(withMcpConnection(config, async () => 'never', { connector })).rejects.toThrow(
      new ConnectionError(`Could not connect to MCP server at ${TEST_URL}: 401 Unauthorized`)
    );
  });

  it('should pass a ConnectionError from the connector through unchanged', async () => {
    const original = new ConnectionError('handshake timed out');
    const connector = async (): Promise<McpConnection> => {
      throw original;
    };

    await expect(withMcpConnection(config, async () => 'never', { connector })).rejects.toBe(original);
  });
});

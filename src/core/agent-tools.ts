import type { AgentTool } from '../agent/types.js';
import type { McpConnection } from '../mcp/mcp-client.js';
import { logDebug } from '../utils/logger.js';
import { ToolInvocationError, describeError } from './errors.js';
import type { ToolDescriptor } from './types.js';

// Most providers accept ^[a-zA-Z0-9_-]{1,64}$ for function names
const MAX_AGENT_TOOL_NAME = 64;

function sanitizeAgentToolName(name: string): string {
  const sanitized = name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, MAX_AGENT_TOOL_NAME);
  return sanitized || 'tool';
}

/**
 * Map each MCP tool name to the name the agent will see, keeping the mapping
 * one-to-one when sanitizing makes two names collide.
 */
export function assignAgentToolNames(names: readonly string[]): Map<string, string> {
  const assigned = new Map<string, string>();
  const taken = new Set<string>();
  for (const name of names) {
    const base = sanitizeAgentToolName(name);
    let candidate = base;
    for (let suffix = 2; taken.has(candidate); suffix++) {
      const tail = `_${suffix}`;
      candidate = `${base.slice(0, MAX_AGENT_TOOL_NAME - tail.length)}${tail}`;
    }
    taken.add(candidate);
    assigned.set(name, candidate);
  }
  return assigned;
}

/** What the agent gets back when calling a tool threw instead of returning */
export interface InvocationFailure {
  error: string;
}

export interface AgentToolOptions {
  signal?: AbortSignal;
  /** From assignAgentToolNames(); computed here when absent */
  agentNames?: Map<string, string>;
}

/**
 * Expose MCP tools to the agent. A call that throws is handed back to the
 * agent as an InvocationFailure so it can weigh the error as evidence; only
 * cancellation propagates.
 */
export function createAgentTools(
  connection: McpConnection,
  descriptors: readonly ToolDescriptor[],
  options: AgentToolOptions = {}
): AgentTool[] {
  const { signal } = options;
  const agentNames = options.agentNames ?? assignAgentToolNames(descriptors.map((descriptor) => descriptor.name));

  return descriptors.map((descriptor) => ({
    name: agentNames.get(descriptor.name) ?? sanitizeAgentToolName(descriptor.name),
    description: descriptor.description,
    inputSchema: descriptor.inputSchema,
    async execute(args: Record<string, unknown>): Promise<unknown> {
      try {
        return await connection.callTool(descriptor.name, args, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        const failure = new ToolInvocationError(descriptor.name, describeError(error), { cause: error });
        logDebug(failure.message, { component: 'Agent Tools' });
        const result: InvocationFailure = { error: failure.message };
        return result;
      }
    },
  }));
}

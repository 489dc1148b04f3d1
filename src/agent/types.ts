import type { JSONSchema7 } from 'json-schema';

/**
 * A tool the agent may call while working on a task.
 */
export interface AgentTool {
  /** Name the model sees; restricted to characters LLM providers accept */
  name: string;
  description: string;
  inputSchema: JSONSchema7;
  execute(args: Record<string, unknown>): Promise<unknown>;
}

export interface AgentTask {
  prompt: string;
  tools: readonly AgentTool[];
  signal?: AbortSignal;
}

export interface AgentUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface AgentRunResult {
  /** The agent's final answer, unparsed */
  text: string;
  usage: AgentUsage;
}

/**
 * An LLM-backed agent. Each run is an independent conversation: nothing said
 * while testing one tool is visible while testing the next.
 */
export interface TestAgent {
  run(task: AgentTask): Promise<AgentRunResult>;
}

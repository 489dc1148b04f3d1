/**
 * Test Orchestrator - drives the agent over the discovered tools and collects
 * exactly one verdict per tool.
 *
 * Per-tool failures (agent errors, unparseable answers) become failing
 * verdicts. Only cancellation escapes, so the runner can report it.
 */

import type { TestAgent, AgentUsage } from "../agent/types.js";
import type { McpConnection } from "../mcp/mcp-client.js";
import { logDebug, logInfo, logWarn } from "../utils/logger.js";
import { abortable } from "./abort.js";
import { assignAgentToolNames, createAgentTools } from "./agent-tools.js";
import { JudgmentParseError, describeError } from "./errors.js";
import { parseJudgment, parseServerJudgment } from "./judgment.js";
import { mapWithConcurrency } from "./pool.js";
import { buildServerTask, buildToolTask } from "./task-builder.js";
import { createVerdict, type TestStrategy, type ToolDescriptor, type ToolVerdict } from "./types.js";

export const DEFAULT_CONCURRENCY = 3;

export interface OrchestratorContext {
  connection: McpConnection;
  agent: TestAgent;
  strategy?: TestStrategy;
  concurrency?: number;
  signal?: AbortSignal;
  /** Called once per verdict, in completion order */
  onVerdict?: (verdict: ToolVerdict) => void;
  /** Token usage is added here as agent runs finish */
  usage?: AgentUsage;
}

function addUsage(total: AgentUsage | undefined, usage: AgentUsage): void {
  if (total) {
    total.inputTokens += usage.inputTokens;
    total.outputTokens += usage.outputTokens;
  }
}

function rethrowIfAborted(signal: AbortSignal | undefined, error: unknown): void {
  if (signal?.aborted) {
    throw error;
  }
}

function failureDetail(error: unknown): string {
  if (error instanceof JudgmentParseError) {
    return `Could not parse the agent's verdict: ${error.message}`;
  }
  return `Agent run failed: ${describeError(error)}`;
}

/**
 * Test a single tool with one agent attempt. Never throws for per-tool failures.
 */
export async function testTool(descriptor: ToolDescriptor, context: OrchestratorContext): Promise<ToolVerdict> {
  const { connection, agent, signal } = context;
  const agentNames = assignAgentToolNames([descriptor.name]);
  const tools = createAgentTools(connection, [descriptor], { signal, agentNames });

  logDebug(`Testing tool "${descriptor.name}"`, { component: "Orchestrator" });

  try {
    const result = await abortable(
      agent.run({ prompt: buildToolTask(descriptor, tools[0].name), tools, signal }),
      signal
    );
    addUsage(context.usage, result.usage);
    const judgment = parseJudgment(result.text);
    return createVerdict(descriptor.name, judgment.passed, judgment.detail);
  } catch (error) {
    rethrowIfAborted(signal, error);
    logWarn(`Test of "${descriptor.name}" did not produce a verdict: ${describeError(error)}`, {
      component: "Orchestrator",
    });
    return createVerdict(descriptor.name, false, failureDetail(error));
  }
}

async function testEachTool(descriptors: readonly ToolDescriptor[], context: OrchestratorContext): Promise<ToolVerdict[]> {
  const concurrency = context.concurrency ?? DEFAULT_CONCURRENCY;
  return mapWithConcurrency(
    descriptors,
    concurrency,
    async (descriptor) => {
      const verdict = await testTool(descriptor, context);
      context.onVerdict?.(verdict);
      return verdict;
    },
    context.signal
  );
}

async function testWholeServer(descriptors: readonly ToolDescriptor[], context: OrchestratorContext): Promise<ToolVerdict[]> {
  const { connection, agent, signal } = context;
  const agentNames = assignAgentToolNames(descriptors.map((descriptor) => descriptor.name));
  const tools = createAgentTools(connection, descriptors, { signal, agentNames });

  let verdicts: ToolVerdict[];
  try {
    const result = await abortable(
      agent.run({ prompt: buildServerTask(descriptors, agentNames), tools, signal }),
      signal
    );
    addUsage(context.usage, result.usage);
    const judgment = parseServerJudgment(
      result.text,
      descriptors.map((descriptor) => ({ name: descriptor.name, agentName: agentNames.get(descriptor.name) }))
    );
    if (judgment.summary) {
      logInfo(`Agent summary: ${judgment.summary}`, { component: "Orchestrator" });
    }
    verdicts = judgment.verdicts;
  } catch (error) {
    rethrowIfAborted(signal, error);
    logWarn(`Whole-server test did not produce verdicts: ${describeError(error)}`, { component: "Orchestrator" });
    const detail = failureDetail(error);
    verdicts = descriptors.map((descriptor) => createVerdict(descriptor.name, false, detail));
  }

  for (const verdict of verdicts) {
    context.onVerdict?.(verdict);
  }
  return verdicts;
}

/**
 * Test every tool and return their verdicts in discovery order.
 */
export async function orchestrate(
  descriptors: readonly ToolDescriptor[],
  context: OrchestratorContext
): Promise<ToolVerdict[]> {
  if (descriptors.length === 0) {
    return [];
  }
  const strategy = context.strategy ?? "per-tool";
  logInfo(`Testing ${descriptors.length} tool(s) with the ${strategy} strategy`, { component: "Orchestrator" });
  return strategy === "whole-server" ? testWholeServer(descriptors, context) : testEachTool(descriptors, context);
}

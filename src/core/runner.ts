/**
 * Runner - resolves input, discovers tools, tests them and assembles the report,
 * all under one run-level time budget.
 */

import type { AgentUsage, TestAgent } from "../agent/types.js";
import { discoverTools, withMcpConnection } from "../mcp/discovery.js";
import type { McpConnector } from "../mcp/mcp-client.js";
import { logInfo, logWarn } from "../utils/logger.js";
import { RunAbortedError, RunTimeoutError } from "./errors.js";
import { resolveRunConfig } from "./input-resolver.js";
import { orchestrate } from "./orchestrator.js";
import { assembleReport } from "./report.js";
import type { RunReport, TestStrategy, ToolDescriptor, ToolVerdict } from "./types.js";

export const DEFAULT_RUN_TIMEOUT_MS = 10 * 60 * 1000;

export interface RunOptions {
  agent: TestAgent;
  strategy?: TestStrategy;
  concurrency?: number;
  timeoutMs?: number;
  connectTimeoutMs?: number;
  /** Return a report flagged partial instead of failing when the run is cut short */
  allowPartial?: boolean;
  /** External cancellation, e.g. SIGINT */
  signal?: AbortSignal;
  connector?: McpConnector;
  onVerdict?: (verdict: ToolVerdict) => void;
}

export interface DiscoveryOptions {
  connector?: McpConnector;
  connectTimeoutMs?: number;
}

/** True when `error` is the run being stopped rather than a failure of its own */
function isAbortRejection(error: unknown, signal: AbortSignal): boolean {
  if (!signal.aborted) {
    return false;
  }
  return error === signal.reason || (error instanceof Error && error.name === "AbortError");
}

/**
 * Connect and list tools without testing them.
 */
export async function listServerTools(rawInput: unknown, options: DiscoveryOptions = {}): Promise<ToolDescriptor[]> {
  const config = resolveRunConfig(rawInput);
  return withMcpConnection(config, (connection) => discoverTools(connection, config.mcpUrl), options);
}

/**
 * Test every tool on the server described by `rawInput`.
 *
 * Configuration, connection and protocol failures, timeouts and external
 * aborts reject with a single TesterError and no report. With `allowPartial`,
 * a timeout or abort after discovery instead yields a report marked partial.
 */
export async function runTests(rawInput: unknown, options: RunOptions): Promise<RunReport> {
  const config = resolveRunConfig(rawInput);
  const timeoutMs = options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new RunTimeoutError(timeoutMs)), timeoutMs);
  const onExternalAbort = () => controller.abort(new RunAbortedError());
  if (options.signal?.aborted) {
    onExternalAbort();
  } else {
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  const usage: AgentUsage = { inputTokens: 0, outputTokens: 0 };
  const completed = new Map<string, ToolVerdict>();
  const progress: { discovered?: ToolDescriptor[] } = {};

  try {
    const verdicts = await withMcpConnection(
      config,
      async (connection) => {
        const discovered = await discoverTools(connection, config.mcpUrl, controller.signal);
        progress.discovered = discovered;
        return orchestrate(discovered, {
          connection,
          agent: options.agent,
          strategy: options.strategy,
          concurrency: options.concurrency,
          signal: controller.signal,
          usage,
          onVerdict: (verdict) => {
            completed.set(verdict.name, verdict);
            options.onVerdict?.(verdict);
          },
        });
      },
      { connector: options.connector, connectTimeoutMs: options.connectTimeoutMs, signal: controller.signal }
    );

    return assembleReport(config.mcpUrl, verdicts);
  } catch (error) {
    if (!isAbortRejection(error, controller.signal)) {
      throw error;
    }
    const reason: unknown = controller.signal.reason;
    const { discovered } = progress;
    if (!options.allowPartial || discovered === undefined) {
      throw reason;
    }

    const untested = discovered.filter((tool) => !completed.has(tool.name)).map((tool) => tool.name);
    const finished = discovered.flatMap((tool) => {
      const verdict = completed.get(tool.name);
      return verdict ? [verdict] : [];
    });
    logWarn(`Run stopped early; reporting ${finished.length} of ${discovered.length} tool(s)`, {
      component: "Runner",
    });
    return assembleReport(config.mcpUrl, finished, { partial: true, untested });
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onExternalAbort);
    const total = usage.inputTokens + usage.outputTokens;
    logInfo(
      `Input tokens: ${usage.inputTokens}, Output tokens: ${usage.outputTokens}, Total tokens: ${total}`,
      { component: "Runner" }
    );
  }
}

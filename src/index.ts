/**
 * Library entry point: run the tester programmatically instead of through the CLI.
 */

export { runTests, listServerTools, DEFAULT_RUN_TIMEOUT_MS, type RunOptions, type DiscoveryOptions } from './core/runner.js';
export { resolveRunConfig, parseHeaderArgs } from './core/input-resolver.js';
export { orchestrate, testTool, DEFAULT_CONCURRENCY, type OrchestratorContext } from './core/orchestrator.js';
export {
  assembleReport,
  formatProseReport,
  renderReport,
  serializeRenderedReport,
  ZERO_TOOLS_NOTE,
  type RenderedReport,
  type PerToolSummaryRecord,
  type RollupRecord,
  type StatusRecord,
} from './core/report.js';
export { parseJudgment, parseServerJudgment, type Judgment, type ServerJudgment } from './core/judgment.js';
export {
  TesterError,
  ConfigurationError,
  ConnectionError,
  ProtocolError,
  ToolInvocationError,
  JudgmentParseError,
  RunTimeoutError,
  RunAbortedError,
  isFatalError,
  type TesterErrorCode,
} from './core/errors.js';
export {
  OUTPUT_MODES,
  TEST_STRATEGIES,
  type OutputMode,
  type TestStrategy,
  type RunConfig,
  type RunReport,
  type ToolDescriptor,
  type ToolVerdict,
} from './core/types.js';
export { discoverTools, withMcpConnection } from './mcp/discovery.js';
export { MCPClient, connectMcp, type McpConnection, type McpConnector } from './mcp/mcp-client.js';
export { AiSdkAgent, createOpenAiAgent, DEFAULT_MODEL, type AiSdkAgentOptions } from './agent/ai-sdk-agent.js';
export type { AgentTask, AgentTool, AgentRunResult, AgentUsage, TestAgent } from './agent/types.js';

/**
 * TestAgent backed by the AI SDK's multi-step tool loop.
 */

import { openai } from '@ai-sdk/openai';
import { generateText, jsonSchema, stepCountIs, tool, type LanguageModel, type Tool, type ToolSet } from 'ai';
import { logDebug } from '../utils/logger.js';
import type { AgentRunResult, AgentTask, AgentTool, TestAgent } from './types.js';

export const DEFAULT_MODEL = 'gpt-4.1-mini';
export const DEFAULT_MAX_STEPS = 8;

export const TESTER_SYSTEM_PROMPT = [
  'You are an MCP tester agent: a seasoned tester with extensive experience in testing MCP servers.',
  'Your goal is to run a simple, realistic test on the MCP server tools you are given and to report',
  'an honest verdict on whether each one works correctly.',
  'Always call the tools you are asked to test before judging them; never guess their behaviour.',
].join(' ');

export interface AiSdkAgentOptions {
  model: LanguageModel;
  maxSteps?: number;
  temperature?: number;
  system?: string;
}

export function toAiSdkTool(agentTool: AgentTool): Tool<Record<string, unknown>, unknown> {
  return tool({
    description: agentTool.description,
    inputSchema: jsonSchema<Record<string, unknown>>(agentTool.inputSchema),
    execute: async (input) => agentTool.execute(input),
  });
}

export function toAiSdkTools(tools: readonly AgentTool[]): ToolSet {
  const toolSet: ToolSet = {};
  for (const agentTool of tools) {
    toolSet[agentTool.name] = toAiSdkTool(agentTool);
  }
  return toolSet;
}

export class AiSdkAgent implements TestAgent {
  private readonly model: LanguageModel;
  private readonly maxSteps: number;
  private readonly temperature: number;
  private readonly system: string;

  constructor(options: AiSdkAgentOptions) {
    this.model = options.model;
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.temperature = options.temperature ?? 0;
    this.system = options.system ?? TESTER_SYSTEM_PROMPT;
  }

  async run(task: AgentTask): Promise<AgentRunResult> {
    const result = await generateText({
      model: this.model,
      system: this.system,
      prompt: task.prompt,
      tools: toAiSdkTools(task.tools),
      stopWhen: stepCountIs(this.maxSteps),
      temperature: this.temperature,
      abortSignal: task.signal,
    });

    logDebug(`Agent finished after ${result.steps.length} step(s)`, {
      component: 'Agent',
      finishReason: result.finishReason,
    });

    return {
      text: result.text,
      usage: {
        inputTokens: result.totalUsage.inputTokens ?? 0,
        outputTokens: result.totalUsage.outputTokens ?? 0,
      },
    };
  }
}

/**
 * Agent on an OpenAI chat model. The provider reads OPENAI_API_KEY itself.
 */
export function createOpenAiAgent(modelId: string = DEFAULT_MODEL, maxSteps: number = DEFAULT_MAX_STEPS): AiSdkAgent {
  return new AiSdkAgent({ model: openai(modelId), maxSteps });
}

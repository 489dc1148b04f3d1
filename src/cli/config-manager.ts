/**
 * Configuration for the tester CLI
 *
 * Merges command-line options, environment variables and defaults into
 * validated settings, and loads run input ({mcpUrl, headers}) from JSON files.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { DEFAULT_MAX_STEPS, DEFAULT_MODEL } from "../agent/ai-sdk-agent.js";
import { ConfigurationError, describeError } from "../core/errors.js";
import { parseHeaderArgs } from "../core/input-resolver.js";
import { DEFAULT_CONCURRENCY } from "../core/orchestrator.js";
import { DEFAULT_RUN_TIMEOUT_MS } from "../core/runner.js";
import { OUTPUT_MODES, TEST_STRATEGIES } from "../core/types.js";
import { DEFAULT_CONNECT_TIMEOUT_MS } from "../mcp/mcp-client.js";

export const MAX_CONCURRENCY = 16;

const settingsSchema = z.object({
  mode: z.enum(OUTPUT_MODES).default("rollup"),
  strategy: z.enum(TEST_STRATEGIES).default("per-tool"),
  concurrency: z.coerce.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_RUN_TIMEOUT_MS),
  connectTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
  model: z.string().trim().min(1).default(DEFAULT_MODEL),
  maxSteps: z.coerce.number().int().min(1).max(50).default(DEFAULT_MAX_STEPS),
  allowPartial: z.boolean().default(false),
});

export type TesterSettings = z.infer<typeof settingsSchema>;

/**
 * Settings as they arrive from the command line: strings, mostly optional.
 */
export interface SettingsInput {
  mode?: string;
  strategy?: string;
  concurrency?: string;
  timeout?: string;
  connectTimeout?: string;
  model?: string;
  maxSteps?: string;
  partial?: boolean;
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve settings. Command-line options win over MCP_TESTER_* variables,
 * which win over defaults.
 */
export function resolveSettings(options: SettingsInput = {}, env: NodeJS.ProcessEnv = process.env): TesterSettings {
  const parsed = settingsSchema.safeParse({
    mode: options.mode ?? envValue(env, "MCP_TESTER_MODE"),
    strategy: options.strategy ?? envValue(env, "MCP_TESTER_STRATEGY"),
    concurrency: options.concurrency ?? envValue(env, "MCP_TESTER_CONCURRENCY"),
    timeoutMs: options.timeout ?? envValue(env, "MCP_TESTER_TIMEOUT_MS"),
    connectTimeoutMs: options.connectTimeout ?? envValue(env, "MCP_TESTER_CONNECT_TIMEOUT_MS"),
    model: options.model ?? envValue(env, "MCP_TESTER_MODEL"),
    maxSteps: options.maxSteps ?? envValue(env, "MCP_TESTER_MAX_STEPS"),
    allowPartial: options.partial,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid settings: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load run input from a JSON file.
 */
export function loadInputFile(inputPath: string): Record<string, unknown> {
  const filePath = path.resolve(inputPath);

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Failed to read input file at ${filePath}: ${describeError(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse input file at ${filePath}: ${describeError(error)}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Input file at ${filePath} must contain a JSON object`);
  }
  return parsed;
}

export interface RunInputOptions {
  url?: string;
  header?: string[];
  input?: string;
}

/**
 * Build raw run input from an optional input file overlaid with --url and
 * --header. Header flags are merged over the file's headers. Validation is
 * left to the input resolver.
 */
export function buildRunInput(options: RunInputOptions): Record<string, unknown> {
  const fromFile = options.input ? loadInputFile(options.input) : {};
  const cliHeaders = options.header && options.header.length > 0 ? parseHeaderArgs(options.header) : undefined;

  const input: Record<string, unknown> = { ...fromFile };
  if (options.url !== undefined) {
    input.mcpUrl = options.url;
  }
  if (cliHeaders) {
    input.headers = { ...(isRecord(fromFile.headers) ? fromFile.headers : {}), ...cliHeaders };
  }
  return input;
}

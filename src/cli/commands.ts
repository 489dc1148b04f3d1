/**
 * CLI Commands for the MCP tool tester
 *
 * Each command returns the process exit code instead of exiting, so the entry
 * point decides when the process ends.
 */

import chalk from "chalk";
import * as fs from "fs";
import * as path from "path";
import { createOpenAiAgent } from "../agent/ai-sdk-agent.js";
import { TesterError } from "../core/errors.js";
import { resolveRunConfig } from "../core/input-resolver.js";
import { renderReport, serializeRenderedReport } from "../core/report.js";
import { listServerTools, runTests } from "../core/runner.js";
import type { TestAgent } from "../agent/types.js";
import type { McpConnector } from "../mcp/mcp-client.js";
import { initializeLogger, logError, logInfo, logWarn } from "../utils/logger.js";
import { buildRunInput, resolveSettings, type RunInputOptions, type SettingsInput } from "./config-manager.js";

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_FATAL = 2;

export interface RunCommandOptions extends RunInputOptions, SettingsInput {
  out?: string;
  debug?: boolean;
}

export interface ToolsCommandOptions extends RunInputOptions {
  connectTimeout?: string;
  debug?: boolean;
}

/** Seams for tests; production uses the OpenAI agent and live connections */
export interface CommandDependencies {
  createAgent?: (model: string, maxSteps: number) => TestAgent;
  connector?: McpConnector;
  write?: (text: string) => void;
}

function writeOutput(text: string, outPath: string | undefined, write: (text: string) => void): void {
  if (!outPath) {
    write(text);
    return;
  }
  const filePath = path.resolve(outPath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text, "utf-8");
  logInfo(`Report written to ${filePath}`, { component: "CLI" });
}

function reportFatal(error: unknown): number {
  if (error instanceof TesterError) {
    logError(`${error.name}: ${error.message}`);
  } else {
    logError("Unexpected error", error);
  }
  return EXIT_FATAL;
}

/**
 * Abort the run on SIGINT/SIGTERM. Returns a function that removes the handlers.
 */
function abortOnSignals(controller: AbortController): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    logWarn(`Received ${signal}, stopping the run`, { component: "CLI" });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return () => {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  };
}

/**
 * Test every tool on the server and print the report
 */
export async function runCommand(options: RunCommandOptions, deps: CommandDependencies = {}): Promise<number> {
  initializeLogger(options.debug);
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  console.error(chalk.cyan("\nMCP Tool Tester"));
  console.error(chalk.cyan("===============\n"));

  const controller = new AbortController();
  const removeSignalHandlers = abortOnSignals(controller);

  try {
    const settings = resolveSettings(options);
    const config = resolveRunConfig(buildRunInput(options));
    const createAgent = deps.createAgent ?? createOpenAiAgent;

    logInfo(`Model: ${settings.model}, strategy: ${settings.strategy}, concurrency: ${settings.concurrency}`, {
      component: "CLI",
    });

    const report = await runTests(config, {
      agent: createAgent(settings.model, settings.maxSteps),
      strategy: settings.strategy,
      concurrency: settings.concurrency,
      timeoutMs: settings.timeoutMs,
      connectTimeoutMs: settings.connectTimeoutMs,
      allowPartial: settings.allowPartial,
      signal: controller.signal,
      connector: deps.connector,
      onVerdict: (verdict) => {
        const mark = verdict.passed ? chalk.green("✓") : chalk.red("✗");
        logInfo(`${mark} ${verdict.name}`, { component: "CLI" });
      },
    });

    for (const note of report.notes) {
      logWarn(note, { component: "CLI" });
    }

    writeOutput(serializeRenderedReport(renderReport(report, settings.mode)), options.out, write);

    logInfo(report.allTestsPassed ? "MCP server works correctly" : "MCP server has failing tools", {
      component: "CLI",
    });
    return report.allTestsPassed ? EXIT_PASSED : EXIT_FAILED;
  } catch (error) {
    return reportFatal(error);
  } finally {
    removeSignalHandlers();
  }
}

/**
 * List the server's tools without testing them
 */
export async function toolsCommand(options: ToolsCommandOptions, deps: CommandDependencies = {}): Promise<number> {
  initializeLogger(options.debug);
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  try {
    const { connectTimeoutMs } = resolveSettings({ connectTimeout: options.connectTimeout });
    const tools = await listServerTools(buildRunInput(options), { connector: deps.connector, connectTimeoutMs });

    if (tools.length === 0) {
      write(chalk.yellow("No tools exposed by this server.\n"));
      return EXIT_PASSED;
    }

    write(chalk.cyan(`\n${tools.length} tool(s):`) + "\n\n");
    for (const tool of tools) {
      write(`${chalk.bold(tool.name)}\n`);
      if (tool.description) {
        write(`  ${tool.description}\n`);
      }
    }
    write("\n");
    return EXIT_PASSED;
  } catch (error) {
    return reportFatal(error);
  }
}

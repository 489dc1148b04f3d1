#!/usr/bin/env node

/**
 * MCP Tool Tester CLI
 *
 * Usage:
 *   mcp-tester run --url <url> [options]     - Test every tool on an MCP server (default command)
 *   mcp-tester tools --url <url> [options]   - List the server's tools without testing them
 */

import { Command } from "commander";
import * as fs from "node:fs";
import { runCommand, toolsCommand, type RunCommandOptions, type ToolsCommandOptions } from "./commands.js";

const pkg: unknown = JSON.parse(fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("mcp-tester")
  .description("Checks that every tool an MCP server exposes works, using an LLM agent to exercise and judge each one")
  .version(version);

program
  .command("run", { isDefault: true })
  .description("Test every tool on an MCP server (default command)")
  .option("-u, --url <url>", "MCP server URL (Streamable HTTP or SSE)")
  .option("-H, --header <header>", 'HTTP header sent on every MCP request, as "Name: value" (repeatable)', collect, [])
  .option("-i, --input <path>", "JSON file with {mcpUrl, headers}; --url and --header override it")
  .option("-m, --mode <mode>", "Output mode: per-tool, rollup or status (default: rollup)")
  .option("-s, --strategy <strategy>", "per-tool (one agent task per tool) or whole-server (default: per-tool)")
  .option("-c, --concurrency <n>", "Tools tested in parallel (default: 3)")
  .option("-t, --timeout <ms>", "Time budget for the whole run in milliseconds (default: 600000)")
  .option("--connect-timeout <ms>", "Timeout for the MCP handshake in milliseconds (default: 60000)")
  .option("--model <id>", "OpenAI model used by the tester agent (default: gpt-4.1-mini)")
  .option("--max-steps <n>", "Maximum agent steps per task (default: 8)")
  .option("--partial", "On timeout or interrupt, print the verdicts gathered so far, marked partial")
  .option("-o, --out <path>", "Write the report to a file instead of stdout")
  .option("-d, --debug", "Enable debug logging")
  .addHelpText("after", `
Examples:
  $ mcp-tester --url https://example.com/mcp
  $ mcp-tester --url https://example.com/mcp -H "Authorization: Bearer test-token" --mode status
  $ mcp-tester --input input.json --mode per-tool --out reports/tools.jsonl
`)
  .action(async (options: RunCommandOptions) => {
    process.exitCode = await runCommand(options);
  });

program
  .command("tools")
  .description("List the tools an MCP server exposes without testing them")
  .option("-u, --url <url>", "MCP server URL")
  .option("-H, --header <header>", 'HTTP header as "Name: value" (repeatable)', collect, [])
  .option("-i, --input <path>", "JSON file with {mcpUrl, headers}")
  .option("--connect-timeout <ms>", "Timeout for the MCP handshake in milliseconds")
  .option("-d, --debug", "Enable debug logging")
  .action(async (options: ToolsCommandOptions) => {
    process.exitCode = await toolsCommand(options);
  });

await program.parseAsync(process.argv);

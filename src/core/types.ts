import type { JSONSchema7 } from 'json-schema';

/**
 * Validated input for one run. Frozen by the input resolver.
 */
export interface RunConfig {
  readonly mcpUrl: string;
  /** Forwarded as HTTP headers on every MCP request */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * A tool as reported by the server's `tools/list`.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  /** JSON Schema for the tool's arguments, exactly as the server sent it */
  readonly inputSchema: JSONSchema7;
}

export interface ToolVerdict {
  readonly name: string;
  readonly passed: boolean;
  readonly detail: string;
}

/**
 * Internal report representation. Every external output shape is rendered from it.
 */
export interface RunReport {
  readonly mcpUrl: string;
  /** In discovery order */
  readonly verdicts: readonly ToolVerdict[];
  readonly allTestsPassed: boolean;
  /** Tools discovered, tested or not */
  readonly toolCount: number;
  /** Set when the run was cut short and some tools were never tested */
  readonly partial: boolean;
  readonly notes: readonly string[];
}

export const OUTPUT_MODES = ['per-tool', 'rollup', 'status'] as const;
export type OutputMode = (typeof OUTPUT_MODES)[number];

/**
 * `per-tool` runs one agent task per tool; `whole-server` hands every tool to a
 * single agent task.
 */
export const TEST_STRATEGIES = ['per-tool', 'whole-server'] as const;
export type TestStrategy = (typeof TEST_STRATEGIES)[number];

export function createVerdict(name: string, passed: boolean, detail: string): ToolVerdict {
  return Object.freeze({ name, passed, detail });
}

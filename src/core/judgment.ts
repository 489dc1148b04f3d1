/**
 * Parsing of the agent's free-text final answer into verdicts.
 *
 * Accepted forms, in order of preference:
 * - a JSON object, bare, inside a fenced code block, or embedded in prose;
 * - `VERDICT: PASS|FAIL` and `DETAIL: ...` lines.
 */

import { z } from 'zod';
import { JudgmentParseError } from './errors.js';
import { createVerdict, type ToolVerdict } from './types.js';

export interface Judgment {
  passed: boolean;
  detail: string;
}

// `worksCorrectly`/`report` is the rollup vocabulary; agents asked for one often answer in the other
const judgmentObjectSchema = z
  .object({
    passed: z.boolean().optional(),
    worksCorrectly: z.boolean().optional(),
    detail: z.string().optional(),
    report: z.string().optional(),
    reason: z.string().optional(),
  })
  .passthrough();

const serverJudgmentSchema = z
  .object({
    tools: z.array(
      z
        .object({
          name: z.string(),
          passed: z.boolean(),
          detail: z.string(),
        })
        .passthrough()
    ),
    summary: z.string().optional(),
  })
  .passthrough();

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/gi;
const VERDICT_LINE = /^\s*\**verdict\**\s*:\s*\**\s*(pass|passed|fail|failed)\b/im;
const DETAIL_LINE = /^\s*\**detail\**\s*:\s*([\s\S]+)$/im;

export const MISSING_TOOL_DETAIL = 'The agent did not report a verdict for this tool.';

function jsonCandidates(text: string): string[] {
  const candidates: string[] = [];
  for (const match of text.matchAll(FENCED_BLOCK)) {
    candidates.push(match[1].trim());
  }
  candidates.push(text);
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first !== -1 && last > first) {
    candidates.push(text.slice(first, last + 1));
  }
  return candidates;
}

function parseJsonObjects(text: string): unknown[] {
  const parsed: unknown[] = [];
  for (const candidate of jsonCandidates(text)) {
    try {
      parsed.push(JSON.parse(candidate));
    } catch {
      // not JSON; try the next candidate
    }
  }
  return parsed;
}

function parseVerdictLines(text: string): Judgment | undefined {
  const verdict = VERDICT_LINE.exec(text);
  const detail = DETAIL_LINE.exec(text);
  if (!verdict || !detail) {
    return undefined;
  }
  const detailText = detail[1].trim();
  if (!detailText) {
    return undefined;
  }
  return { passed: verdict[1].toLowerCase().startsWith('pass'), detail: detailText };
}

function excerpt(text: string, limit = 200): string {
  const flattened = text.replace(/\s+/g, ' ').trim();
  return flattened.length > limit ? `${flattened.slice(0, limit)}...` : flattened;
}

/**
 * Parse a single-tool answer into `{passed, detail}`.
 * @throws JudgmentParseError when no accepted form is found
 */
export function parseJudgment(text: string): Judgment {
  if (!text.trim()) {
    throw new JudgmentParseError('The agent returned an empty answer', text);
  }

  for (const value of parseJsonObjects(text)) {
    const result = judgmentObjectSchema.safeParse(value);
    if (!result.success) {
      continue;
    }
    const passed = result.data.passed ?? result.data.worksCorrectly;
    const detail = (result.data.detail ?? result.data.report ?? result.data.reason)?.trim();
    if (passed !== undefined && detail) {
      return { passed, detail };
    }
  }

  const fromLines = parseVerdictLines(text);
  if (fromLines) {
    return fromLines;
  }

  throw new JudgmentParseError(`The agent's answer has no recognizable verdict: "${excerpt(text)}"`, text);
}

export interface ServerJudgment {
  /** One per expected tool, in the order given */
  verdicts: ToolVerdict[];
  summary?: string;
}

export interface ExpectedTool {
  name: string;
  /** Name the agent saw, if it differs */
  agentName?: string;
}

type ServerEntry = z.infer<typeof serverJudgmentSchema>['tools'][number];

function matchesName(entry: ServerEntry, tool: ExpectedTool): boolean {
  return entry.name === tool.name;
}

function matchesAgentName(entry: ServerEntry, tool: ExpectedTool): boolean {
  return tool.agentName !== undefined && entry.name === tool.agentName;
}

/**
 * Pair entries with expected tools. An entry is used at most once and a tool
 * takes at most one entry. Names only one tool answers to are settled first,
 * then real names, then agent names, so a sanitized name that collides with
 * another tool's real name cannot credit one verdict to both.
 */
function matchEntries(entries: readonly ServerEntry[], expected: readonly ExpectedTool[]): Array<ServerEntry | undefined> {
  const matched = new Array<ServerEntry | undefined>(expected.length).fill(undefined);
  const used = new Set<number>();

  const claim = (accepts: (entry: ServerEntry, tool: ExpectedTool) => boolean) => {
    entries.forEach((entry, entryIndex) => {
      if (used.has(entryIndex)) {
        return;
      }
      const toolIndex = expected.findIndex((tool, index) => matched[index] === undefined && accepts(entry, tool));
      if (toolIndex !== -1) {
        matched[toolIndex] = entry;
        used.add(entryIndex);
      }
    });
  };

  claim(
    (entry, tool) =>
      (matchesName(entry, tool) || matchesAgentName(entry, tool)) &&
      expected.filter((other) => matchesName(entry, other) || matchesAgentName(entry, other)).length === 1
  );
  claim(matchesName);
  claim(matchesAgentName);
  return matched;
}

/**
 * Parse a whole-server answer. Every expected tool gets exactly one verdict:
 * tools the agent left out fail, names it made up are ignored.
 * @throws JudgmentParseError when the answer has no tools list at all
 */
export function parseServerJudgment(text: string, expected: readonly ExpectedTool[]): ServerJudgment {
  if (!text.trim()) {
    throw new JudgmentParseError('The agent returned an empty answer', text);
  }

  for (const value of parseJsonObjects(text)) {
    const result = serverJudgmentSchema.safeParse(value);
    if (!result.success) {
      continue;
    }

    const entries = matchEntries(result.data.tools, expected);
    const verdicts = expected.map((tool, index) => {
      const entry = entries[index];
      if (!entry) {
        return createVerdict(tool.name, false, MISSING_TOOL_DETAIL);
      }
      return createVerdict(tool.name, entry.passed, entry.detail.trim() || '(no detail provided)');
    });
    return { verdicts, summary: result.data.summary };
  }

  throw new JudgmentParseError(`The agent's answer has no per-tool verdict list: "${excerpt(text)}"`, text);
}

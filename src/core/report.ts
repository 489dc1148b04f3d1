/**
 * Report Assembler - pure functions from verdicts to the report and its
 * external renderings. No I/O.
 */

import type { OutputMode, RunReport, ToolVerdict } from './types.js';

export const ZERO_TOOLS_NOTE = 'No tools were exposed by the MCP server; nothing was tested.';

export interface AssembleOptions {
  /** The run was cut short before every tool was tested */
  partial?: boolean;
  /** Names of tools discovered but never tested, in discovery order */
  untested?: readonly string[];
}

export interface RollupRecord {
  mcpUrl: string;
  worksCorrectly: boolean;
  report: string;
  partial?: true;
}

export interface StatusRecord {
  mcpUrl: string;
  allTestsPassed: boolean;
  toolsStatus: Record<string, { passed: boolean; detail: string }>;
  partial?: true;
  notes?: string[];
}

/** Trailing JSON Lines record, written whenever the report carries notes */
export interface PerToolSummaryRecord {
  partial: boolean;
  notes: string[];
}

export type RenderedReport =
  | { mode: 'per-tool'; records: ToolVerdict[]; summary?: PerToolSummaryRecord }
  | { mode: 'rollup'; record: RollupRecord }
  | { mode: 'status'; record: StatusRecord };

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function partialRunNote(untested: readonly string[]): string {
  const listed = untested.length > 0 ? `: ${untested.join(', ')}` : '';
  return `Run stopped before every tool was tested; ${plural(untested.length, 'tool')} left untested${listed}.`;
}

export function assembleReport(
  mcpUrl: string,
  verdicts: readonly ToolVerdict[],
  options: AssembleOptions = {}
): RunReport {
  const partial = options.partial ?? false;
  const untested = options.untested ?? [];
  const toolCount = verdicts.length + untested.length;

  const notes: string[] = [];
  if (toolCount === 0) {
    notes.push(ZERO_TOOLS_NOTE);
  }
  if (partial) {
    notes.push(partialRunNote(untested));
  }

  return Object.freeze({
    mcpUrl,
    verdicts: Object.freeze(verdicts.map((verdict) => Object.freeze({ ...verdict }))),
    allTestsPassed: !partial && verdicts.every((verdict) => verdict.passed),
    toolCount,
    partial,
    notes: Object.freeze(notes),
  });
}

export function formatProseReport(report: RunReport): string {
  const passedCount = report.verdicts.filter((verdict) => verdict.passed).length;
  const failedCount = report.verdicts.length - passedCount;

  const lines = [
    `Tested ${plural(report.verdicts.length, 'tool')} on ${report.mcpUrl}: ${passedCount} passed, ${failedCount} failed.`,
  ];
  if (report.verdicts.length > 0) {
    lines.push('');
    for (const verdict of report.verdicts) {
      lines.push(`${verdict.passed ? 'PASS' : 'FAIL'} ${verdict.name}: ${verdict.detail}`);
    }
  }
  for (const note of report.notes) {
    lines.push('', note);
  }
  lines.push(
    '',
    report.allTestsPassed
      ? 'Verdict: the MCP server works correctly.'
      : 'Verdict: the MCP server does not work correctly.'
  );
  return lines.join('\n');
}

export function renderReport(report: RunReport, mode: OutputMode): RenderedReport {
  const partialFlag = report.partial ? { partial: true as const } : {};
  const hasNotes = report.notes.length > 0;

  switch (mode) {
    case 'per-tool':
      return {
        mode,
        records: report.verdicts.map(({ name, passed, detail }) => ({ name, passed, detail })),
        ...(hasNotes ? { summary: { partial: report.partial, notes: [...report.notes] } } : {}),
      };
    case 'rollup':
      return {
        mode,
        record: {
          mcpUrl: report.mcpUrl,
          worksCorrectly: report.allTestsPassed,
          report: formatProseReport(report),
          ...partialFlag,
        },
      };
    case 'status':
      return {
        mode,
        record: {
          mcpUrl: report.mcpUrl,
          allTestsPassed: report.allTestsPassed,
          toolsStatus: Object.fromEntries(
            report.verdicts.map(({ name, passed, detail }) => [name, { passed, detail }])
          ),
          ...partialFlag,
          ...(hasNotes ? { notes: [...report.notes] } : {}),
        },
      };
  }
}

/**
 * Serialize for output: JSON Lines for per-tool records, with the summary
 * record last, and indented JSON otherwise.
 */
export function serializeRenderedReport(rendered: RenderedReport): string {
  if (rendered.mode === 'per-tool') {
    const lines: object[] = rendered.summary ? [...rendered.records, rendered.summary] : rendered.records;
    return lines.map((line) => `${JSON.stringify(line)}\n`).join('');
  }
  return `${JSON.stringify(rendered.record, null, 2)}\n`;
}

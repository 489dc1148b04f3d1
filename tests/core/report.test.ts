/**
 * Unit tests for the report assembler (report.ts)
 */

import { describe, it, expect } from 'vitest';
import {
  ZERO_TOOLS_NOTE,
  assembleReport,
  formatProseReport,
  partialRunNote,
  renderReport,
  serializeRenderedReport,
} from '../../src/core/report.js';
import { createVerdict } from '../../src/core/types.js';

// ── Fixtures ──────────────────────────────────────────────────────────────────

const MCP_URL = 'http://localhost:3000/mcp';
const echoPassed = createVerdict('echo', true, 'returned the input text');
const searchFailed = createVerdict('search', false, 'server returned 500');

// ── Assembly ──────────────────────────────────────────────────────────────────

describe('assembleReport', () => {
  it('should fail the aggregate when any tool fails', () => {
    const report = assembleReport(MCP_URL, [echoPassed, searchFailed]);

    expect(report).toEqual({
      mcpUrl: MCP_URL,
      verdicts: [echoPassed, searchFailed],
      allTestsPassed: false,
      toolCount: 2,
      partial: false,
      notes: [],
    });
  });

  it('should pass the aggregate when every tool passes', () => {
    expect(assembleReport(MCP_URL, [echoPassed]).allTestsPassed).toBe(true);
  });

  it('should pass vacuously with zero tools and say so', () => {
    const report = assembleReport(MCP_URL, []);

    expect(report.allTestsPassed).toBe(true);
    expect(report.toolCount).toBe(0);
    expect(report.notes).toEqual([ZERO_TOOLS_NOTE]);
  });

  it('should give equal reports for equal input', () => {
    expect(assembleReport(MCP_URL, [echoPassed, searchFailed])).toEqual(assembleReport(MCP_URL, [echoPassed, searchFailed]));
  });

  it('should freeze the report', () => {
    const report = assembleReport(MCP_URL, [echoPassed]);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.verdicts)).toBe(true);
  });

  it('should never pass a partial report', () => {
    const report = assembleReport(MCP_URL, [echoPassed], { partial: true, untested: ['search'] });

    expect(report.allTestsPassed).toBe(false);
    expect(report.partial).toBe(true);
    expect(report.toolCount).toBe(2);
    expect(report.notes).toEqual(['Run stopped before every tool was tested; 1 tool left untested: search.']);
  });
});

describe('partialRunNote', () => {
  it('should pluralize and list the untested tools', () => {
    expect(partialRunNote(['a', 'b'])).toBe('Run stopped before every tool was tested; 2 tools left untested: a, b.');
  });

  it('should omit the list when nothing was left untested', () => {
    expect(partialRunNote([])).toBe('Run stopped before every tool was tested; 0 tools left untested.');
  });
});

// ── Prose ─────────────────────────────────────────────────────────────────────

describe('formatProseReport', () => {
  it('should list each verdict and the overall conclusion', () => {
    const prose = formatProseReport(assembleReport(MCP_URL, [echoPassed, searchFailed]));

    expect(prose).toBe(
      [
        'Tested 2 tools on http://localhost:3000/mcp: 1 passed, 1 failed.',
        '',
        'PASS echo: returned the input text',
        'FAIL search: server returned 500',
        '',
        'Verdict: the MCP server does not work correctly.',
      ].join('\n')
    );
  });

  it('should carry the zero-tools note', () => {
    expect(formatProseReport(assembleReport(MCP_URL, []))).toBe(
      [
        'Tested 0 tools on http://localhost:3000/mcp: 0 passed, 0 failed.',
        '',
        ZERO_TOOLS_NOTE,
        '',
        'Verdict: the MCP server works correctly.',
      ].join('\n')
    );
  });

  it('should use the singular for one tool', () => {
    expect(formatProseReport(assembleReport(MCP_URL, [echoPassed]))).toBe(
      [
        'Tested 1 tool on http://localhost:3000/mcp: 1 passed, 0 failed.',
        '',
        'PASS echo: returned the input text',
        '',
        'Verdict: the MCP server works correctly.',
      ].join('\n')
    );
  });
});

// ── Renderings ────────────────────────────────────────────────────────────────

describe('renderReport', () => {
  const report = assembleReport(MCP_URL, [echoPassed, searchFailed]);

  it('should render per-tool records in discovery order', () => {
    expect(renderReport(report, 'per-tool')).toEqual({
      mode: 'per-tool',
      records: [
        { name: 'echo', passed: true, detail: 'returned the input text' },
        { name: 'search', passed: false, detail: 'server returned 500' },
      ],
    });
  });

  it('should render the rollup record with the prose report', () => {
    expect(renderReport(report, 'rollup')).toEqual({
      mode: 'rollup',
      record: { mcpUrl: MCP_URL, worksCorrectly: false, report: formatProseReport(report) },
    });
  });

  it('should render the status record keyed by tool name', () => {
    expect(renderReport(report, 'status')).toEqual({
      mode: 'status',
      record: {
        mcpUrl: MCP_URL,
        allTestsPassed: false,
        toolsStatus: {
          echo: { passed: true, detail: 'returned the input text' },
          search: { passed: false, detail: 'server returned 500' },
        },
      },
    });
  });

  it('should flag partial reports', () => {
    const partial = assembleReport(MCP_URL, [echoPassed], { partial: true, untested: ['search'] });
    const rendered = renderReport(partial, 'status');

    expect(rendered.mode === 'status' && rendered.record.partial).toBe(true);
  });

  it('should not add a partial flag to complete reports', () => {
    const rendered = renderReport(report, 'rollup');

    expect(rendered.mode === 'rollup' && 'partial' in rendered.record).toBe(false);
  });

  it('should carry the zero-tools note in the status record', () => {
    expect(renderReport(assembleReport(MCP_URL, []), 'status')).toEqual({
      mode: 'status',
      record: { mcpUrl: MCP_URL, allTestsPassed: true, toolsStatus: {}, notes: [ZERO_TOOLS_NOTE] },
    });
  });

  it('should add a summary to per-tool records of a partial report', () => {
    const partial = assembleReport(MCP_URL, [echoPassed], { partial: true, untested: ['search'] });

    expect(renderReport(partial, 'per-tool')).toEqual({
      mode: 'per-tool',
      records: [{ name: 'echo', passed: true, detail: 'returned the input text' }],
      summary: {
        partial: true,
        notes: ['Run stopped before every tool was tested; 1 tool left untested: search.'],
      },
    });
  });

  it('should leave the summary off complete per-tool reports without notes', () => {
    expect('summary' in renderReport(report, 'per-tool')).toBe(false);
  });
});

describe('serializeRenderedReport', () => {
  it('should write per-tool records as JSON Lines', () => {
    const rendered = renderReport(assembleReport(MCP_URL, [echoPassed, searchFailed]), 'per-tool');

    expect(serializeRenderedReport(rendered)).toBe(
      '{"name":"echo","passed":true,"detail":"returned the input text"}\n' +
        '{"name":"search","passed":false,"detail":"server returned 500"}\n'
    );
  });

  it('should write the zero-tools note as the only per-tool line', () => {
    expect(serializeRenderedReport(renderReport(assembleReport(MCP_URL, []), 'per-tool'))).toBe(
      `{"partial":false,"notes":["${ZERO_TOOLS_NOTE}"]}\n`
    );
  });

  it('should end partial per-tool output with the summary line', () => {
    const partial = assembleReport(MCP_URL, [echoPassed], { partial: true, untested: ['search'] });

    expect(serializeRenderedReport(renderReport(partial, 'per-tool'))).toBe(
      '{"name":"echo","passed":true,"detail":"returned the input text"}\n' +
        '{"partial":true,"notes":["Run stopped before every tool was tested; 1 tool left untested: search."]}\n'
    );
  });

  it('should write the status record as indented JSON', () => {
    const output = serializeRenderedReport(renderReport(assembleReport(MCP_URL, [echoPassed]), 'status'));

    expect(output).toBe(
      [
        '{',
        '  "mcpUrl": "http://localhost:3000/mcp",',
        '  "allTestsPassed": true,',
        '  "toolsStatus": {',
        '    "echo": {',
        '      "passed": true,',
        '      "detail": "returned the input text"',
        '    }',
        '  }',
        '}',
        '',
      ].join('\n')
    );
  });
});

import { describe, it, expect } from 'vitest';
import { buildServerTask, buildToolTask } from '../../src/core/task-builder.js';
import type { ToolDescriptor } from '../../src/core/types.js';

const echo: ToolDescriptor = {
  name: 'echo',
  description: 'Echo text back',
  inputSchema: { type: 'object', properties: { text: { type: 'string' } } },
};

describe('buildToolTask', () => {
  it('should name the tool and embed its description and schema', () => {
    const task = buildToolTask(echo);

    expect(task).toContain('Tool: echo\nDescription: Echo text back\n');
    expect(task).toContain('Input schema: {"type":"object","properties":{"text":{"type":"string"}}}');
    expect(task).not.toContain('Call it as:');
  });

  it('should give the callable name when it differs from the tool name', () => {
    const task = buildToolTask({ ...echo, name: 'get.weather' }, 'get_weather');

    expect(task).toContain('Tool: get.weather\nCall it as: get_weather\n');
  });

  it('should mark a missing description', () => {
    expect(buildToolTask({ ...echo, description: '' })).toContain('Description: (none provided)');
  });

  it('should end with the expected answer shape', () => {
    const lines = buildToolTask(echo).split('\n');

    expect(lines[lines.length - 1]).toBe(
      '{"passed": true or false, "detail": "what you called it with, what came back, and why that passes or fails"}'
    );
  });
});

describe('buildServerTask', () => {
  it('should number every tool and use the callable names', () => {
    const search: ToolDescriptor = { ...echo, name: 'web.search', description: 'Search the web' };
    const task = buildServerTask([echo, search], new Map([['web.search', 'web_search']]));

    expect(task).toContain('1. Tool: echo\nDescription: Echo text back');
    expect(task).toContain('2. Tool: web.search\nCall it as: web_search\nDescription: Search the web');
    expect(task).toContain('"summary": "<overall assessment>"');
  });
});

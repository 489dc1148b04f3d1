import type { ToolDescriptor } from './types.js';

const JUDGING_CRITERIA = [
  'A tool works correctly when:',
  '- the call completes without a server error or an error result (`isError: true`);',
  '- the output matches the shape and intent its description and schema promise;',
  '- the output is not empty or obviously malformed when content was expected.',
  'A tool that rejects arguments which do satisfy its schema is not working correctly.',
].join('\n');

function describeTool(descriptor: ToolDescriptor, agentName: string): string {
  const lines = [`Tool: ${descriptor.name}`];
  if (agentName !== descriptor.name) {
    lines.push(`Call it as: ${agentName}`);
  }
  lines.push(`Description: ${descriptor.description || '(none provided)'}`);
  lines.push(`Input schema: ${JSON.stringify(descriptor.inputSchema)}`);
  return lines.join('\n');
}

/**
 * Task for testing a single tool.
 */
export function buildToolTask(descriptor: ToolDescriptor, agentName: string = descriptor.name): string {
  return [
    'Test the following MCP server tool.',
    '',
    describeTool(descriptor, agentName),
    '',
    'Steps:',
    '1. Choose plausible arguments that are valid under the input schema.',
    '2. Call the tool with those arguments.',
    '3. Inspect the raw result.',
    '4. Judge whether the tool behaves as its description says it should.',
    '',
    JUDGING_CRITERIA,
    '',
    'When you are done, reply with only a JSON object in exactly this shape:',
    '{"passed": true or false, "detail": "what you called it with, what came back, and why that passes or fails"}',
  ].join('\n');
}

/**
 * Task for testing every tool in one agent conversation.
 */
export function buildServerTask(
  descriptors: readonly ToolDescriptor[],
  agentNames: ReadonlyMap<string, string> = new Map()
): string {
  const toolSections = descriptors.map((descriptor, index) =>
    `${index + 1}. ${describeTool(descriptor, agentNames.get(descriptor.name) ?? descriptor.name)}`
  );

  return [
    'Test the MCP server and its available tools.',
    '',
    'For each tool below:',
    '1. Run a basic operation with plausible, schema-valid arguments.',
    '2. Verify that the tool responds correctly and as expected.',
    '3. Document any errors or unexpected behaviour.',
    '',
    JUDGING_CRITERIA,
    '',
    'Tools:',
    ...toolSections,
    '',
    'When you are done, reply with only a JSON object in exactly this shape, with one entry per tool',
    'using the tool names exactly as listed after "Tool:":',
    '{"tools": [{"name": "<tool name>", "passed": true or false, "detail": "<what happened and why>"}], "summary": "<overall assessment>"}',
  ].join('\n');
}

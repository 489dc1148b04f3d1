import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { RunConfig } from './types.js';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

const rawRunInputSchema = z.object(
  {
    mcpUrl: z
      .string({
        required_error: 'mcpUrl is required',
        invalid_type_error: 'mcpUrl must be a string',
      })
      .trim()
      .min(1, 'mcpUrl is required'),
    // null is what a blank optional field in a JSON input form comes back as
    headers: z
      .record(z.string(), z.string({ invalid_type_error: 'header values must be strings' }), {
        invalid_type_error: 'headers must be an object mapping header names to string values',
      })
      .nullish(),
  },
  { invalid_type_error: 'run input must be an object' }
);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate raw run input and produce a frozen RunConfig.
 *
 * A missing `headers` field is an empty mapping. The URL must be absolute and
 * use http or https, the only schemes the MCP HTTP transports can reach.
 */
export function resolveRunConfig(raw: unknown): RunConfig {
  const parsed = rawRunInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid run input: ${formatIssues(parsed.error)}`);
  }

  const { mcpUrl } = parsed.data;
  let url: URL;
  try {
    url = new URL(mcpUrl);
  } catch {
    throw new ConfigurationError(`Invalid run input: mcpUrl "${mcpUrl}" is not a valid URL`);
  }
  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new ConfigurationError(
      `Invalid run input: mcpUrl must use http or https, got "${url.protocol}"`
    );
  }

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed.data.headers ?? {})) {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ConfigurationError('Invalid run input: header names must not be empty');
    }
    headers[trimmed] = value;
  }

  return Object.freeze({ mcpUrl, headers: Object.freeze(headers) });
}

/**
 * Parse `"Name: value"` header arguments as given on the command line.
 * Later occurrences of a name win.
 */
export function parseHeaderArgs(values: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const entry of values) {
    const separator = entry.indexOf(':');
    if (separator <= 0) {
      throw new ConfigurationError(`Invalid header "${entry}": expected "Name: value"`);
    }
    const name = entry.slice(0, separator).trim();
    if (!name) {
      throw new ConfigurationError(`Invalid header "${entry}": header name is empty`);
    }
    headers[name] = entry.slice(separator + 1).trim();
  }
  return headers;
}

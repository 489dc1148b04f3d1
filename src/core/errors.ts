/**
 * Error taxonomy for a test run.
 *
 * Fatal errors abort the run and reach the caller as a single error. Per-tool
 * errors (invocation, judgment parsing) are folded into that tool's verdict.
 */

export type TesterErrorCode =
  | 'CONFIGURATION'
  | 'CONNECTION'
  | 'PROTOCOL'
  | 'TOOL_INVOCATION'
  | 'JUDGMENT_PARSE'
  | 'RUN_TIMEOUT'
  | 'RUN_ABORTED';

export abstract class TesterError extends Error {
  abstract readonly code: TesterErrorCode;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid run input. */
export class ConfigurationError extends TesterError {
  readonly code = 'CONFIGURATION';
  readonly fatal = true;
}

/** The MCP server could not be reached, authenticated against, or handshaken with. */
export class ConnectionError extends TesterError {
  readonly code = 'CONNECTION';
  readonly fatal = true;
}

/** The server answered, but not with a well-formed discovery response. */
export class ProtocolError extends TesterError {
  readonly code = 'PROTOCOL';
  readonly fatal = true;
}

export class ToolInvocationError extends TesterError {
  readonly code = 'TOOL_INVOCATION';
  readonly fatal = false;

  constructor(
    readonly toolName: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Tool "${toolName}" failed: ${reason}`, options);
  }
}

export class JudgmentParseError extends TesterError {
  readonly code = 'JUDGMENT_PARSE';
  readonly fatal = false;

  constructor(
    message: string,
    readonly rawText: string
  ) {
    super(message);
  }
}

export class RunTimeoutError extends TesterError {
  readonly code = 'RUN_TIMEOUT';
  readonly fatal = true;

  constructor(readonly timeoutMs: number) {
    super(`Test run exceeded its time budget of ${timeoutMs}ms`);
  }
}

/** The run was cancelled from outside (SIGINT, a caller's AbortSignal). */
export class RunAbortedError extends TesterError {
  readonly code = 'RUN_ABORTED';
  readonly fatal = true;

  constructor(reason = 'Test run was aborted') {
    super(reason);
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof TesterError && error.fatal;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

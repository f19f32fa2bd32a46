import { ExecResult } from '../domain/ports/process-runner.port';
import { firstNonBlankLine } from '../utils/tool-output.util';

/**
 * ExternalToolError - Normalized failure of an external command-line tool
 *
 * Raised when a tool exits non-zero, cannot be started, times out, or
 * prints output that cannot be parsed. Never carries the tool's full
 * stdout, which may contain personal data.
 */
export class ExternalToolError extends Error {
  /**
   * Logical tool name (e.g. "ledger-list")
   */
  readonly tool: string;

  /**
   * Exit code of the run, or -1 when the tool never completed
   */
  readonly exitCode: number;

  /**
   * First non-blank stderr line, truncated to 200 characters
   */
  readonly stderrSummary: string | null;

  readonly timestamp: string;

  constructor(params: {
    tool: string;
    message: string;
    exitCode: number;
    stderr?: string;
  }) {
    super(params.message);
    this.name = 'ExternalToolError';
    this.tool = params.tool;
    this.exitCode = params.exitCode;
    this.stderrSummary = params.stderr
      ? firstNonBlankLine(params.stderr, '').substring(0, 200) || null
      : null;
    this.timestamp = new Date().toISOString();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, ExternalToolError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'ExternalToolError',
      message: this.message,
      tool: this.tool,
      exitCode: this.exitCode,
      stderrSummary: this.stderrSummary,
      timestamp: this.timestamp,
    };
  }

  /**
   * Create ExternalToolError from a failed run
   */
  static fromExecResult(tool: string, result: ExecResult): ExternalToolError {
    const detail = firstNonBlankLine(
      result.stderr,
      `exit code ${result.exitCode}`,
    );
    return new ExternalToolError({
      tool,
      message: `${tool} failed: ${detail}`,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }

  /**
   * Create ExternalToolError for output that does not have the expected shape
   */
  static fromMalformedOutput(
    tool: string,
    result: ExecResult,
    cause: unknown,
  ): ExternalToolError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ExternalToolError({
      tool,
      message: `${tool} returned unreadable output: ${reason}`,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
}

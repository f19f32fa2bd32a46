/**
 * Exit code reported when the child never started, timed out or was aborted.
 */
export const SPAWN_FAILURE_EXIT_CODE = -1;

export interface ExecResult {
  /** argv joined with spaces, for logs only */
  command: string;
  workdir: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

export interface ExecOptions {
  /** Overrides the configured externalTools.timeoutMs */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Process Runner Port
 *
 * Runs an external program from an argv vector (never through a shell)
 * and captures its complete output. Implementations never reject: start
 * failures, timeouts and aborts come back as a result with
 * SPAWN_FAILURE_EXIT_CODE and an explanatory stderr line.
 */
export abstract class ProcessRunnerPort {
  abstract execute(
    argv: string[],
    workdir: string,
    env?: Record<string, string>,
    options?: ExecOptions,
  ): Promise<ExecResult>;
}

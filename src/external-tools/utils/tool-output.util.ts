import { ExecResult } from '../domain/ports/process-runner.port';

export interface ToolRunResult extends ExecResult {
  ok: boolean;
  /** First non-blank stderr line when the run failed */
  reason: string | null;
}

export function firstNonBlankLine(text: string, fallback: string): string {
  const line = text
    .split(/\r?\n/)
    .map((candidate) => candidate.trim())
    .find((candidate) => candidate.length > 0);
  return line ?? fallback;
}

export function toToolRunResult(
  result: ExecResult,
  fallbackReason: string,
): ToolRunResult {
  const ok = result.exitCode === 0;
  return {
    ...result,
    ok,
    reason: ok ? null : firstNonBlankLine(result.stderr, fallbackReason),
  };
}

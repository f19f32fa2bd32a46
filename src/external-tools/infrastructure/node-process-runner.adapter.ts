import { spawn } from 'child_process';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../config/config.type';
import { DEFAULT_TOOL_TIMEOUT_MS } from '../config/external-tools.config';
import {
  ExecOptions,
  ExecResult,
  ProcessRunnerPort,
  SPAWN_FAILURE_EXIT_CODE,
} from '../domain/ports/process-runner.port';

/**
 * Node Process Runner Adapter
 *
 * Spawns the program directly (shell: false) so arguments are never
 * re-parsed. stdout and stderr are drained concurrently as they arrive;
 * a child that fills one pipe while we wait on the other cannot stall.
 *
 * The child inherits this process's environment with `env` layered on top.
 * On timeout or abort the child is killed with SIGKILL and the result
 * carries SPAWN_FAILURE_EXIT_CODE.
 */
@Injectable()
export class NodeProcessRunnerAdapter extends ProcessRunnerPort {
  private readonly logger = new Logger(NodeProcessRunnerAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    super();
  }

  execute(
    argv: string[],
    workdir: string,
    env: Record<string, string> = {},
    options: ExecOptions = {},
  ): Promise<ExecResult> {
    const command = argv.join(' ');
    const cwd = workdir.trim();
    const timeoutMs =
      options.timeoutMs ??
      this.configService.get('externalTools.timeoutMs', { infer: true }) ??
      DEFAULT_TOOL_TIMEOUT_MS;
    const startedAt = Date.now();

    const failed = (reason: string): ExecResult => ({
      command,
      workdir: cwd,
      exitCode: SPAWN_FAILURE_EXIT_CODE,
      stdout: '',
      stderr: `${reason}\n`,
      timedOut: false,
      durationMs: Date.now() - startedAt,
    });

    const [program, ...args] = argv;
    if (!program || !program.trim()) {
      return Promise.resolve(failed('Failed to start command: empty argv'));
    }
    if (options.signal?.aborted) {
      return Promise.resolve(failed('Command aborted before start'));
    }

    this.logger.debug(`Running "${command}" in ${cwd || '<current dir>'}`);

    return new Promise<ExecResult>((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let spawnError: string | null = null;
      let timedOut = false;
      let aborted = false;
      let settled = false;

      const child = spawn(program, args, {
        cwd: cwd || undefined,
        env: { ...process.env, ...env },
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
      });

      child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, timeoutMs);

      const onAbort = () => {
        aborted = true;
        child.kill('SIGKILL');
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (code: number | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);

        let stderr = Buffer.concat(stderrChunks).toString('utf8');
        if (spawnError) {
          stderr += `Failed to start command: ${spawnError}\n`;
        }
        if (timedOut) {
          stderr += `Command timed out after ${timeoutMs}ms\n`;
        }
        if (aborted) {
          stderr += 'Command aborted by caller\n';
        }

        const interrupted = spawnError !== null || timedOut || aborted;
        const result: ExecResult = {
          command,
          workdir: cwd,
          exitCode:
            interrupted || code === null ? SPAWN_FAILURE_EXIT_CODE : code,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr,
          timedOut,
          durationMs: Date.now() - startedAt,
        };

        if (result.exitCode === 0) {
          this.logger.debug(
            `"${command}" finished in ${result.durationMs}ms`,
          );
        } else {
          this.logger.warn(
            `"${command}" exited with ${result.exitCode} after ${result.durationMs}ms`,
          );
        }
        resolve(result);
      };

      child.on('error', (error: Error) => {
        spawnError = error.message;
        finish(null);
      });
      child.on('close', (code: number | null) => finish(code));
    });
  }
}

import * as path from 'path';
import { ConfigService } from '@nestjs/config';
import { CredentialIssuanceCliAdapter } from './credential-issuance-cli.adapter';
import {
  ExecResult,
  ProcessRunnerPort,
} from '../../../external-tools/domain/ports/process-runner.port';
import { AllConfigType } from '../../../config/config.type';

describe('CredentialIssuanceCliAdapter', () => {
  let execute: jest.Mock<
    Promise<ExecResult>,
    Parameters<ProcessRunnerPort['execute']>
  >;
  let adapter: CredentialIssuanceCliAdapter;

  beforeEach(() => {
    execute = jest.fn().mockResolvedValue({
      command: '',
      workdir: '/opt/credentials',
      exitCode: 0,
      stdout: 'issued 2 credentials\n',
      stderr: '',
      timedOut: false,
      durationMs: 3000,
    });
    const configService = {
      getOrThrow: jest.fn().mockReturnValue({
        workdir: '/opt/credentials',
        venvPath: 'venv',
        script: 'issue_credentials_from_db.py',
      }),
    } as unknown as ConfigService<AllConfigType>;
    adapter = new CredentialIssuanceCliAdapter({ execute }, configService);
  });

  it('should run the script with the virtualenv interpreter and environment', async () => {
    const result = await adapter.issueCredentials();

    expect(result.ok).toBe(true);
    const [argv, workdir, env] = execute.mock.calls[0];
    expect(argv).toEqual([
      '/opt/credentials/venv/bin/python3',
      'issue_credentials_from_db.py',
    ]);
    expect(workdir).toBe('/opt/credentials');
    expect(env?.VIRTUAL_ENV).toBe('/opt/credentials/venv');
    expect(env?.PATH?.split(path.delimiter)[0]).toBe('/opt/credentials/venv/bin');
  });

  it('should report failures without throwing', async () => {
    execute.mockResolvedValue({
      command: '',
      workdir: '/opt/credentials',
      exitCode: 1,
      stdout: '',
      stderr: 'Traceback (most recent call last):\n',
      timedOut: false,
      durationMs: 10,
    });

    const result = await adapter.issueCredentials();

    expect(result.ok).toBe(false);
    expect(result.reason).toBe('Traceback (most recent call last):');
  });
});

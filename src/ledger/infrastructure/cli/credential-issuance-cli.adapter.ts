import * as path from 'path';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { ProcessRunnerPort } from '../../../external-tools/domain/ports/process-runner.port';
import {
  ToolRunResult,
  toToolRunResult,
} from '../../../external-tools/utils/tool-output.util';
import { CredentialIssuancePort } from '../../domain/ports/credential-issuance.port';

/**
 * Credential Issuance CLI Adapter
 *
 * Runs the issuance script with the virtualenv's interpreter directly.
 * Activation is reproduced by exporting VIRTUAL_ENV and putting the
 * venv's bin directory first on PATH; no shell is involved.
 */
@Injectable()
export class CredentialIssuanceCliAdapter extends CredentialIssuancePort {
  private readonly logger = new Logger(CredentialIssuanceCliAdapter.name);

  constructor(
    private readonly processRunner: ProcessRunnerPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    super();
  }

  async issueCredentials(signal?: AbortSignal): Promise<ToolRunResult> {
    const credentials = this.configService.getOrThrow(
      'externalTools.credentials',
      { infer: true },
    );

    const venv = path.resolve(credentials.workdir, credentials.venvPath);
    const venvBin = path.join(venv, 'bin');

    const result = toToolRunResult(
      await this.processRunner.execute(
        [path.join(venvBin, 'python3'), credentials.script],
        credentials.workdir,
        {
          VIRTUAL_ENV: venv,
          PATH: [venvBin, process.env.PATH ?? ''].join(path.delimiter),
        },
        { signal },
      ),
      'Credential issuance failed',
    );

    if (!result.ok) {
      this.logger.error(
        `Credential issuance failed (exit ${result.exitCode}): ${result.reason}`,
      );
    }
    return result;
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { ProcessRunnerPort } from '../../../external-tools/domain/ports/process-runner.port';
import {
  ToolRunResult,
  toToolRunResult,
} from '../../../external-tools/utils/tool-output.util';
import { LedgerSyncPort } from '../../domain/ports/ledger-sync.port';
import { LedgerIdentity } from '../../domain/entities/ledger-document-view.entity';

/**
 * Ledger Sync CLI Adapter
 *
 * Drives the ledger client's sync script:
 *   <node> <syncScript> --person <idType> <idNumber>
 *   <node> <syncScript> --all
 */
@Injectable()
export class LedgerSyncCliAdapter extends LedgerSyncPort {
  private readonly logger = new Logger(LedgerSyncCliAdapter.name);

  constructor(
    private readonly processRunner: ProcessRunnerPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    super();
  }

  async syncIdentity(
    identity: LedgerIdentity,
    signal?: AbortSignal,
  ): Promise<ToolRunResult> {
    return this.run(
      ['--person', identity.idType.trim(), identity.idNumber.trim()],
      signal,
    );
  }

  async syncAll(signal?: AbortSignal): Promise<ToolRunResult> {
    return this.run(['--all'], signal);
  }

  private async run(
    scriptArgs: string[],
    signal?: AbortSignal,
  ): Promise<ToolRunResult> {
    const ledger = this.configService.getOrThrow('externalTools.ledger', {
      infer: true,
    });

    const result = toToolRunResult(
      await this.processRunner.execute(
        [ledger.nodeBin, ledger.syncScript, ...scriptArgs],
        ledger.workdir,
        {},
        { signal },
      ),
      'Ledger synchronization failed',
    );

    if (result.ok) {
      this.logger.debug(`Ledger sync ${scriptArgs[0]} completed`);
    } else {
      this.logger.error(
        `Ledger sync ${scriptArgs[0]} failed (exit ${result.exitCode}): ${result.reason}`,
      );
    }
    return result;
  }
}

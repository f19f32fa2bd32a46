import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { ProcessRunnerPort } from '../../../external-tools/domain/ports/process-runner.port';
import { ExternalToolError } from '../../../external-tools/errors/external-tool.error';
import { LedgerQueryPort } from '../../domain/ports/ledger-query.port';
import {
  LedgerDocumentView,
  LedgerIdentity,
} from '../../domain/entities/ledger-document-view.entity';
import { extractJsonArray } from '../../utils/json-array-extractor.util';
import { LedgerDocumentMapper } from './ledger-document.mapper';

const TOOL_NAME = 'ledger-list';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Ledger Query CLI Adapter
 *
 * Runs `<node> <listScript> <idType> <idNumber>` and parses the JSON array
 * the script prints. Non-object array entries are skipped.
 */
@Injectable()
export class LedgerQueryCliAdapter extends LedgerQueryPort {
  private readonly logger = new Logger(LedgerQueryCliAdapter.name);

  constructor(
    private readonly processRunner: ProcessRunnerPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    super();
  }

  async listDocuments(
    identity: LedgerIdentity,
    signal?: AbortSignal,
  ): Promise<LedgerDocumentView[]> {
    const ledger = this.configService.getOrThrow('externalTools.ledger', {
      infer: true,
    });

    const result = await this.processRunner.execute(
      [
        ledger.nodeBin,
        ledger.listScript,
        identity.idType.trim(),
        identity.idNumber.trim(),
      ],
      ledger.workdir,
      {},
      { signal },
    );

    if (result.exitCode !== 0) {
      const error = ExternalToolError.fromExecResult(TOOL_NAME, result);
      this.logger.error(error.message);
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJsonArray(result.stdout));
    } catch (cause) {
      const error = ExternalToolError.fromMalformedOutput(
        TOOL_NAME,
        result,
        cause,
      );
      this.logger.error(error.message);
      throw error;
    }

    if (!Array.isArray(parsed)) {
      throw ExternalToolError.fromMalformedOutput(
        TOOL_NAME,
        result,
        'expected a JSON array',
      );
    }

    const documents = parsed
      .filter(isRecord)
      .map((raw) => LedgerDocumentMapper.toView(raw, ledger.networkName));
    this.logger.debug(`Ledger listed ${documents.length} document(s)`);
    return documents;
  }

  async findDocumentById(
    identity: LedgerIdentity,
    docId: string,
    signal?: AbortSignal,
  ): Promise<LedgerDocumentView | null> {
    const wanted = docId.trim();
    if (!wanted) {
      return null;
    }

    const documents = await this.listDocuments(identity, signal);
    return documents.find((document) => document.docId.trim() === wanted) ?? null;
  }
}

import { ToolRunResult } from '../../../external-tools/utils/tool-output.util';
import { LedgerIdentity } from '../entities/ledger-document-view.entity';

/**
 * Ledger Sync Port
 *
 * Pushes local document state to the ledger. Failures are returned as
 * results (ok: false), never thrown.
 */
export abstract class LedgerSyncPort {
  abstract syncIdentity(
    identity: LedgerIdentity,
    signal?: AbortSignal,
  ): Promise<ToolRunResult>;

  abstract syncAll(signal?: AbortSignal): Promise<ToolRunResult>;
}

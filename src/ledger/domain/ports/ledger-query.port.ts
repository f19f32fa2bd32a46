import {
  LedgerDocumentView,
  LedgerIdentity,
} from '../entities/ledger-document-view.entity';

/**
 * Ledger Query Port
 *
 * Reads what the ledger holds for an identity.
 * Throws ExternalToolError when the tool fails or its output is unreadable.
 */
export abstract class LedgerQueryPort {
  abstract listDocuments(
    identity: LedgerIdentity,
    signal?: AbortSignal,
  ): Promise<LedgerDocumentView[]>;

  abstract findDocumentById(
    identity: LedgerIdentity,
    docId: string,
    signal?: AbortSignal,
  ): Promise<LedgerDocumentView | null>;
}

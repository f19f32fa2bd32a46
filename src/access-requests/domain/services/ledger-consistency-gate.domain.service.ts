import { Injectable, Logger } from '@nestjs/common';
import { LedgerSyncPort } from '../../../ledger/domain/ports/ledger-sync.port';
import { LedgerQueryPort } from '../../../ledger/domain/ports/ledger-query.port';
import { DocumentLedgerMatcher } from '../../../ledger/domain/services/document-ledger-matcher.domain.service';
import {
  LedgerDocumentView,
  LedgerIdentity,
} from '../../../ledger/domain/entities/ledger-document-view.entity';
import { ExternalToolError } from '../../../external-tools/errors/external-tool.error';
import { PersonDocumentRepositoryPort } from '../../../person-documents/domain/repositories/person-document.repository.port';
import { PersonDocument } from '../../../person-documents/domain/entities/person-document.entity';
import { FileRecord } from '../../../person-documents/domain/entities/file-record.entity';
import { selectLatestFile } from '../../../person-documents/domain/utils/latest-file.util';
import { Person } from '../../../persons/domain/entities/person.entity';
import { AuditService, DisclosureEventType } from '../../../audit/audit.service';
import { KeyedLock } from '../../../utils/keyed-lock';
import { AccessRequest } from '../entities/access-request.entity';
import {
  AccessRequestErrorCode,
  AccessRequestIntegrityError,
  AccessRequestValidationError,
} from '../errors/access-request.errors';

export interface DocumentWithLatestFile {
  document: PersonDocument;
  file: FileRecord;
}

/**
 * Ledger Consistency Gate
 *
 * Decides whether local documents are confirmed on the ledger.
 *
 * Approval runs sync → list → match, strictly in that order, and holds a
 * per-identity lock for the whole sequence so two approvals for the same
 * person never drive the tools at the same time. Retrieval skips the sync
 * and re-checks against a fresh listing.
 */
@Injectable()
export class LedgerConsistencyGate {
  private readonly logger = new Logger(LedgerConsistencyGate.name);

  constructor(
    private readonly ledgerSync: LedgerSyncPort,
    private readonly ledgerQuery: LedgerQueryPort,
    private readonly matcher: DocumentLedgerMatcher,
    private readonly personDocumentRepository: PersonDocumentRepositoryPort,
    private readonly auditService: AuditService,
    private readonly identityLock: KeyedLock,
  ) {}

  /**
   * Sync the owner's documents to the ledger and confirm every item.
   *
   * @throws AccessRequestValidationError LEDGER_SYNC_FAILED, LEDGER_UNAVAILABLE,
   *   NO_FILE or LEDGER_UNMATCHED; nothing is persisted by this method
   */
  async assertApprovable(
    request: AccessRequest,
    owner: Person,
    signal?: AbortSignal,
  ): Promise<void> {
    const identity = LedgerConsistencyGate.identityOf(owner);

    await this.identityLock.run(
      `${identity.idType}:${identity.idNumber}`,
      async () => {
        // 1. Push local state to the ledger
        const sync = await this.ledgerSync.syncIdentity(identity, signal);
        if (!sync.ok) {
          this.auditService.logDisclosureEvent({
            actorType: 'person',
            actorId: owner.id,
            event: DisclosureEventType.LEDGER_SYNC_FAILED,
            success: false,
            errorMessage: sync.reason ?? undefined,
            metadata: { requestId: request.id, exitCode: sync.exitCode },
          });
          throw new AccessRequestValidationError(
            AccessRequestErrorCode.LEDGER_SYNC_FAILED,
            `Could not register the approval on the ledger. Try again. Detail: ${sync.reason}`,
          );
        }

        // 2. One listing for all items
        const ledgerDocs = await this.listLedgerDocuments(identity, signal);

        // 3. Every item's latest file must be on the ledger
        for (const item of request.items) {
          const { document, file } = await this.loadDocumentWithLatestFile(
            item.personDocumentId,
          );
          if (!this.matcher.findMatch(ledgerDocs, document, file)) {
            this.auditService.logDisclosureEvent({
              actorType: 'person',
              actorId: owner.id,
              event: DisclosureEventType.LEDGER_VALIDATION_FAILED,
              success: false,
              metadata: { requestId: request.id, documentId: document.id },
            });
            throw new AccessRequestValidationError(
              AccessRequestErrorCode.LEDGER_UNMATCHED,
              `Could not validate document '${document.title ?? 'Untitled'}' (#${document.id}) on the ledger. Try again.`,
            );
          }
        }
      },
    );
  }

  /**
   * Confirm one approved document against a fresh ledger listing.
   *
   * @returns the matching ledger record
   */
  async verifyForRetrieval(
    owner: Person,
    document: PersonDocument,
    file: FileRecord,
    signal?: AbortSignal,
  ): Promise<LedgerDocumentView> {
    const identity = LedgerConsistencyGate.identityOf(owner);
    const ledgerDocs = await this.listLedgerDocuments(identity, signal);

    const match = this.matcher.findMatch(ledgerDocs, document, file);
    if (!match) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.LEDGER_UNMATCHED,
        'The document is not available on the ledger for this person. Request a new approval.',
      );
    }
    return match;
  }

  async loadDocumentWithLatestFile(
    personDocumentId: number,
  ): Promise<DocumentWithLatestFile> {
    const document =
      await this.personDocumentRepository.findByIdWithFiles(personDocumentId);
    if (!document) {
      throw new AccessRequestIntegrityError(
        `Requested document ${personDocumentId} no longer exists`,
      );
    }

    const file = selectLatestFile(document.files);
    if (!file) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.NO_FILE,
        `Document '${document.title ?? 'Untitled'}' (#${document.id}) has no stored file`,
      );
    }
    return { document, file };
  }

  private async listLedgerDocuments(
    identity: LedgerIdentity,
    signal?: AbortSignal,
  ): Promise<LedgerDocumentView[]> {
    try {
      return await this.ledgerQuery.listDocuments(identity, signal);
    } catch (error) {
      if (error instanceof ExternalToolError) {
        this.logger.error(`Ledger listing failed: ${error.message}`);
        throw new AccessRequestValidationError(
          AccessRequestErrorCode.LEDGER_UNAVAILABLE,
          `Could not query the ledger. Try again. Detail: ${error.message}`,
        );
      }
      throw error;
    }
  }

  private static identityOf(person: Person): LedgerIdentity {
    return { idType: person.idType, idNumber: person.idNumber };
  }
}

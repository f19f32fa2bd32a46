import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccessRequestRepositoryPort } from '../repositories/access-request.repository.port';
import {
  ACCESS_REQUEST_GRACE_PERIOD_DAYS,
  AccessRequest,
  MAX_DECISION_NOTE_LENGTH,
  MAX_PURPOSE_LENGTH,
} from '../entities/access-request.entity';
import { AccessRequestStatus } from '../enums/access-request-status.enum';
import {
  AccessRequestErrorCode,
  AccessRequestIntegrityError,
  AccessRequestValidationError,
} from '../errors/access-request.errors';
import { AccessRequestStateMachine } from '../utils/access-request-state-machine.util';
import {
  DocumentWithLatestFile,
  LedgerConsistencyGate,
} from './ledger-consistency-gate.domain.service';
import { PersonRepositoryPort } from '../../../persons/domain/repositories/person.repository.port';
import { Person } from '../../../persons/domain/entities/person.entity';
import { IssuingEntityRepositoryPort } from '../../../issuing-entities/domain/repositories/issuing-entity.repository.port';
import { PersonDocumentRepositoryPort } from '../../../person-documents/domain/repositories/person-document.repository.port';
import { ReviewStatus } from '../../../person-documents/domain/enums/review-status.enum';
import {
  FileStoragePort,
  StoredFileHandle,
} from '../../../person-documents/domain/ports/file-storage.port';
import { LedgerTrace } from '../../../ledger/domain/entities/ledger-trace.entity';
import { toLedgerTrace } from '../../../ledger/utils/ledger-trace.formatter';
import { AuditService, DisclosureEventType } from '../../../audit/audit.service';
import { ClockPort } from '../../../utils/clock/clock.port';
import { AllConfigType } from '../../../config/config.type';

const DAY_MS = 24 * 60 * 60 * 1000;

const invalid = (message: string) =>
  new AccessRequestValidationError(AccessRequestErrorCode.INVALID_INPUT, message);

/**
 * Access Request Domain Service
 *
 * Handles the consent workflow:
 * 1. Create request (issuing entity, for approved documents of one person)
 * 2. Decide (owner approves or rejects; approval is gated on the ledger)
 * 3. Retrieve approved documents and their ledger trace (requester only)
 *
 * State Machine:
 * - pending → approved | rejected (owner)
 * - pending → expired (decision attempted after expiresAt)
 * - approved/rejected/expired are terminal
 *
 * All state changes use compare-and-swap on status; a lost race surfaces
 * as ALREADY_DECIDED.
 */
@Injectable()
export class AccessRequestDomainService {
  private readonly logger = new Logger(AccessRequestDomainService.name);

  constructor(
    private readonly accessRequestRepository: AccessRequestRepositoryPort,
    private readonly personRepository: PersonRepositoryPort,
    private readonly issuingEntityRepository: IssuingEntityRepositoryPort,
    private readonly personDocumentRepository: PersonDocumentRepositoryPort,
    private readonly fileStorage: FileStoragePort,
    private readonly ledgerGate: LedgerConsistencyGate,
    private readonly auditService: AuditService,
    private readonly clock: ClockPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Create a pending access request
   *
   * Validation:
   * - requester, owner, purpose (≤ 300 chars after trim) and ≥ 1 document
   * - each document exists, belongs to the owner and is APPROVED
   *
   * Duplicate document ids collapse to one item.
   */
  async createRequest(
    requesterEntityId: number,
    ownerPersonId: number,
    purpose: string,
    personDocumentIds: number[],
  ): Promise<AccessRequest> {
    // 1. Validate inputs
    if (!requesterEntityId) {
      throw invalid('Requesting organization is required');
    }
    if (!ownerPersonId) {
      throw invalid('Person is required');
    }
    const trimmedPurpose = (purpose ?? '').trim();
    if (!trimmedPurpose) {
      throw invalid('Purpose is required');
    }
    if (trimmedPurpose.length > MAX_PURPOSE_LENGTH) {
      throw invalid(
        `Purpose must be at most ${MAX_PURPOSE_LENGTH} characters`,
      );
    }
    const documentIds = [...new Set(personDocumentIds ?? [])];
    if (documentIds.length === 0) {
      throw invalid('At least one document must be selected');
    }

    // 2. Load requester and owner
    const requester =
      await this.issuingEntityRepository.findById(requesterEntityId);
    if (!requester) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.NOT_FOUND,
        `Requesting organization ${requesterEntityId} not found`,
      );
    }
    const owner = await this.personRepository.findById(ownerPersonId);
    if (!owner) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.NOT_FOUND,
        `Person ${ownerPersonId} not found`,
      );
    }

    // 3. Every document must be the owner's and approved
    for (const documentId of documentIds) {
      const document =
        await this.personDocumentRepository.findByIdWithFiles(documentId);
      if (!document) {
        throw new AccessRequestValidationError(
          AccessRequestErrorCode.NOT_FOUND,
          `Document ${documentId} not found`,
        );
      }
      if (document.personId !== owner.id) {
        throw invalid(`Document ${documentId} does not belong to the person`);
      }
      if (document.reviewStatus !== ReviewStatus.APPROVED) {
        throw new AccessRequestValidationError(
          AccessRequestErrorCode.NOT_DISCLOSABLE,
          `Document ${documentId} is not approved for disclosure`,
        );
      }
    }

    // 4. Persist request + items atomically
    const requestedAt = this.clock.now();
    const request = await this.accessRequestRepository.createWithItems({
      requesterEntityId: requester.id,
      ownerPersonId: owner.id,
      purpose: trimmedPurpose,
      status: AccessRequestStatus.PENDING,
      requestedAt,
      decidedAt: null,
      expiresAt: new Date(
        requestedAt.getTime() + ACCESS_REQUEST_GRACE_PERIOD_DAYS * DAY_MS,
      ),
      decisionNote: null,
      personDocumentIds: documentIds,
    });

    // 5. Audit log
    this.auditService.logDisclosureEvent({
      actorType: 'issuer',
      actorId: requester.id,
      event: DisclosureEventType.ACCESS_REQUEST_CREATED,
      success: true,
      metadata: {
        requestId: request.id,
        ownerPersonId: owner.id,
        itemCount: documentIds.length,
      },
    });

    return request;
  }

  async listForPerson(personId: number): Promise<AccessRequest[]> {
    return this.accessRequestRepository.findByOwnerPersonId(personId);
  }

  async listForEntity(entityId: number): Promise<AccessRequest[]> {
    return this.accessRequestRepository.findByRequesterEntityId(entityId);
  }

  async getById(requestId: number): Promise<AccessRequest> {
    const request =
      await this.accessRequestRepository.findByIdWithItems(requestId);
    if (!request) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.NOT_FOUND,
        `Access request ${requestId} not found`,
      );
    }
    return request;
  }

  /**
   * Approve or reject a pending request
   *
   * Order of checks: existence, ownership, pending, expiry. An expired
   * request is moved to EXPIRED before the error is raised.
   *
   * Approval first syncs the owner's documents to the ledger and confirms
   * every item there; any failure leaves the request pending.
   */
  async decide(
    requestId: number,
    deciderPersonId: number,
    approve: boolean,
    note?: string | null,
    signal?: AbortSignal,
  ): Promise<AccessRequest> {
    const trimmedNote = (note ?? '').trim();
    if (trimmedNote.length > MAX_DECISION_NOTE_LENGTH) {
      throw invalid(
        `Decision note must be at most ${MAX_DECISION_NOTE_LENGTH} characters`,
      );
    }

    // 1. Load and authorize
    const request = await this.getById(requestId);
    if (request.ownerPersonId !== deciderPersonId) {
      this.logger.warn(
        `Person ${deciderPersonId} attempted to decide access request ${requestId} owned by another person`,
      );
      this.auditService.logDisclosureEvent({
        actorType: 'person',
        actorId: deciderPersonId,
        event: DisclosureEventType.ACCESS_REQUEST_DECISION_UNAUTHORIZED,
        success: false,
        metadata: { requestId },
      });
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.FORBIDDEN,
        'Not authorized to decide this access request',
      );
    }

    // 2. Only pending requests can be decided
    if (request.status !== AccessRequestStatus.PENDING) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.ALREADY_DECIDED,
        'Access request has already been decided',
      );
    }

    // 3. Expiry moves the request to EXPIRED
    const now = this.clock.now();
    if (AccessRequestStateMachine.isExpired(request, now)) {
      const expired = await this.accessRequestRepository.applyDecisionIfPending(
        requestId,
        { status: AccessRequestStatus.EXPIRED, decidedAt: now, decisionNote: null },
      );
      if (!expired) {
        throw new AccessRequestValidationError(
          AccessRequestErrorCode.ALREADY_DECIDED,
          'Access request has already been decided',
        );
      }
      this.auditService.logDisclosureEvent({
        actorType: 'person',
        actorId: deciderPersonId,
        event: DisclosureEventType.ACCESS_REQUEST_EXPIRED,
        success: true,
        metadata: { requestId },
      });
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.EXPIRED,
        'Access request has expired',
      );
    }

    // 4. Ledger gate before approval
    if (approve) {
      const owner = await this.loadOwner(request);
      await this.ledgerGate.assertApprovable(request, owner, signal);
    }

    // 5. Commit only if still pending
    const status = approve
      ? AccessRequestStatus.APPROVED
      : AccessRequestStatus.REJECTED;
    AccessRequestStateMachine.validateTransition(request.status, status);

    const decidedAt = this.clock.now();
    const decisionNote = trimmedNote || null;
    const committed = await this.accessRequestRepository.applyDecisionIfPending(
      requestId,
      { status, decidedAt, decisionNote },
    );
    if (!committed) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.ALREADY_DECIDED,
        'Access request has already been decided',
      );
    }

    // 6. Audit log
    this.auditService.logDisclosureEvent({
      actorType: 'person',
      actorId: deciderPersonId,
      event: approve
        ? DisclosureEventType.ACCESS_REQUEST_APPROVED
        : DisclosureEventType.ACCESS_REQUEST_REJECTED,
      success: true,
      metadata: { requestId, itemCount: request.items.length },
    });

    return { ...request, status, decidedAt, decisionNote };
  }

  /**
   * Open an approved document's latest file for the requesting organization
   *
   * The document is re-confirmed against a fresh ledger listing on every
   * retrieval.
   */
  async loadApprovedResource(
    requesterEntityId: number,
    requestId: number,
    personDocumentId: number,
    signal?: AbortSignal,
  ): Promise<StoredFileHandle> {
    const { owner, document, file } = await this.resolveApprovedDocument(
      requesterEntityId,
      requestId,
      personDocumentId,
    );

    await this.ledgerGate.verifyForRetrieval(owner, document, file, signal);
    const handle = await this.fileStorage.open(file);

    this.auditService.logDisclosureEvent({
      actorType: 'issuer',
      actorId: requesterEntityId,
      event: DisclosureEventType.APPROVED_RESOURCE_ACCESSED,
      success: true,
      metadata: { requestId, documentId: document.id, fileId: file.id },
    });
    return handle;
  }

  /**
   * Ledger record of an approved document, rendered for display
   */
  async loadApprovedDocumentTrace(
    requesterEntityId: number,
    requestId: number,
    personDocumentId: number,
    signal?: AbortSignal,
  ): Promise<LedgerTrace> {
    const { owner, document, file } = await this.resolveApprovedDocument(
      requesterEntityId,
      requestId,
      personDocumentId,
    );

    const ledgerDoc = await this.ledgerGate.verifyForRetrieval(
      owner,
      document,
      file,
      signal,
    );

    this.auditService.logDisclosureEvent({
      actorType: 'issuer',
      actorId: requesterEntityId,
      event: DisclosureEventType.APPROVED_TRACE_VIEWED,
      success: true,
      metadata: { requestId, documentId: document.id },
    });

    const networkName = this.configService.getOrThrow(
      'externalTools.ledger.networkName',
      { infer: true },
    );
    return toLedgerTrace(ledgerDoc, networkName);
  }

  /**
   * Gates shared by retrieval operations, in order: existence, requester,
   * approved, not expired, document in the request, latest file present.
   */
  private async resolveApprovedDocument(
    requesterEntityId: number,
    requestId: number,
    personDocumentId: number,
  ): Promise<DocumentWithLatestFile & { owner: Person }> {
    const request = await this.getById(requestId);

    if (request.requesterEntityId !== requesterEntityId) {
      this.logger.warn(
        `Entity ${requesterEntityId} attempted to retrieve a document of access request ${requestId}`,
      );
      this.auditService.logDisclosureEvent({
        actorType: 'issuer',
        actorId: requesterEntityId,
        event: DisclosureEventType.APPROVED_RESOURCE_DENIED,
        success: false,
        metadata: { requestId, documentId: personDocumentId },
      });
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.FORBIDDEN,
        'Access request does not belong to this organization',
      );
    }
    if (request.status !== AccessRequestStatus.APPROVED) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.NOT_APPROVED,
        'Access request is not approved',
      );
    }
    if (AccessRequestStateMachine.isExpired(request, this.clock.now())) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.EXPIRED,
        'Access request has expired',
      );
    }
    if (
      !request.items.some((item) => item.personDocumentId === personDocumentId)
    ) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.OUT_OF_SCOPE,
        'Document is not part of this access request',
      );
    }

    const owner = await this.loadOwner(request);
    const { document, file } =
      await this.ledgerGate.loadDocumentWithLatestFile(personDocumentId);
    return { owner, document, file };
  }

  private async loadOwner(request: AccessRequest): Promise<Person> {
    const owner = await this.personRepository.findById(request.ownerPersonId);
    if (!owner) {
      throw new AccessRequestIntegrityError(
        `Owner ${request.ownerPersonId} of access request ${request.id} no longer exists`,
      );
    }
    return owner;
  }
}

import { LedgerConsistencyGate } from './ledger-consistency-gate.domain.service';
import { AccessRequest } from '../entities/access-request.entity';
import { AccessRequestStatus } from '../enums/access-request-status.enum';
import {
  AccessRequestErrorCode,
  AccessRequestIntegrityError,
} from '../errors/access-request.errors';
import { Person } from '../../../persons/domain/entities/person.entity';
import { IdType } from '../../../persons/domain/enums/id-type.enum';
import { PersonDocument } from '../../../person-documents/domain/entities/person-document.entity';
import { ReviewStatus } from '../../../person-documents/domain/enums/review-status.enum';
import { PersonDocumentRepositoryPort } from '../../../person-documents/domain/repositories/person-document.repository.port';
import { LedgerSyncPort } from '../../../ledger/domain/ports/ledger-sync.port';
import { LedgerQueryPort } from '../../../ledger/domain/ports/ledger-query.port';
import { DocumentLedgerMatcher } from '../../../ledger/domain/services/document-ledger-matcher.domain.service';
import { ToolRunResult } from '../../../external-tools/utils/tool-output.util';
import { AuditService } from '../../../audit/audit.service';
import { KeyedLock } from '../../../utils/keyed-lock';

const owner: Person = {
  id: 7,
  idType: IdType.CC,
  idNumber: '1001',
  firstName: 'Ana',
  lastName: 'Tester',
  createdAt: new Date('2024-12-01T00:00:00.000Z'),
};

const document: PersonDocument = {
  id: 55,
  personId: 7,
  title: null,
  issuerEntityId: null,
  reviewStatus: ReviewStatus.APPROVED,
  createdAt: new Date('2025-01-10T08:00:00.000Z'),
  files: [
    {
      id: 91,
      personDocumentId: 55,
      originalName: 'scan.pdf',
      mimeType: 'application/pdf',
      byteSize: 100,
      sha256Hex: null,
      storagePath: 'persons/7/scan.pdf',
      version: 1,
      uploadedAt: new Date('2025-01-10T08:00:00.000Z'),
    },
  ],
};

const request = (id: number): AccessRequest => ({
  id,
  requesterEntityId: 3,
  ownerPersonId: 7,
  purpose: 'Audit',
  status: AccessRequestStatus.PENDING,
  requestedAt: new Date('2025-01-20T10:00:00.000Z'),
  decidedAt: null,
  expiresAt: new Date('2025-02-04T10:00:00.000Z'),
  decisionNote: null,
  items: [{ id: id * 10, accessRequestId: id, personDocumentId: 55, documentTitle: null }],
});

const okSync = (): ToolRunResult => ({
  command: 'node sync-db-to-ledger.js --person CC 1001',
  workdir: '/opt/ledger/client',
  exitCode: 0,
  stdout: '',
  stderr: '',
  timedOut: false,
  durationMs: 10,
  ok: true,
  reason: null,
});

describe('LedgerConsistencyGate', () => {
  let gate: LedgerConsistencyGate;
  let lock: KeyedLock;
  let syncIdentity: jest.Mock<Promise<ToolRunResult>, Parameters<LedgerSyncPort['syncIdentity']>>;
  let listDocuments: jest.Mock<
    ReturnType<LedgerQueryPort['listDocuments']>,
    Parameters<LedgerQueryPort['listDocuments']>
  >;
  let findByIdWithFiles: jest.Mock<
    ReturnType<PersonDocumentRepositoryPort['findByIdWithFiles']>,
    [number]
  >;

  beforeEach(() => {
    syncIdentity = jest.fn().mockResolvedValue(okSync());
    listDocuments = jest.fn().mockResolvedValue([
      {
        docId: 'tx-1',
        title: '',
        issuingEntity: 'Hyperledger Fabric',
        status: 'Registered',
        createdAt: '',
        sizeBytes: null,
        filePath: '/data/persons/7/scan.pdf',
      },
    ]);
    findByIdWithFiles = jest.fn().mockResolvedValue(document);
    lock = new KeyedLock();

    gate = new LedgerConsistencyGate(
      { syncIdentity, syncAll: jest.fn() },
      { listDocuments, findDocumentById: jest.fn() },
      new DocumentLedgerMatcher(),
      { findByIdWithFiles, findApprovedByPersonId: jest.fn() },
      { logDisclosureEvent: jest.fn() } as unknown as AuditService,
      lock,
    );
  });

  it('should accept a document matched by path when it has no title', async () => {
    await expect(gate.assertApprovable(request(11), owner)).resolves.toBeUndefined();
  });

  it('should serialize approvals for the same person', async () => {
    let releaseFirstSync: () => void = () => undefined;
    syncIdentity.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          releaseFirstSync = () => resolve(okSync());
        }),
    );

    const first = gate.assertApprovable(request(11), owner);
    const second = gate.assertApprovable(request(12), owner);

    await new Promise((resolve) => setImmediate(resolve));
    expect(syncIdentity).toHaveBeenCalledTimes(1);
    expect(lock.isLocked('CC:1001')).toBe(true);

    releaseFirstSync();
    await Promise.all([first, second]);

    expect(syncIdentity).toHaveBeenCalledTimes(2);
    expect(listDocuments).toHaveBeenCalledTimes(2);
  });

  it('should release the person after a failed approval', async () => {
    syncIdentity.mockResolvedValueOnce({
      ...okSync(),
      ok: false,
      exitCode: 1,
      reason: 'timeout',
    });

    await expect(gate.assertApprovable(request(11), owner)).rejects.toMatchObject({
      code: AccessRequestErrorCode.LEDGER_SYNC_FAILED,
      message: 'Could not register the approval on the ledger. Try again. Detail: timeout',
    });
    await expect(gate.assertApprovable(request(12), owner)).resolves.toBeUndefined();
  });

  it('should name an untitled document in the mismatch message', async () => {
    listDocuments.mockResolvedValue([]);

    await expect(gate.assertApprovable(request(11), owner)).rejects.toMatchObject({
      code: AccessRequestErrorCode.LEDGER_UNMATCHED,
      message: "Could not validate document 'Untitled' (#55) on the ledger. Try again.",
    });
  });

  it('should let non-tool errors from the listing through unchanged', async () => {
    const failure = new TypeError('unexpected');
    listDocuments.mockRejectedValue(failure);

    await expect(
      gate.verifyForRetrieval(owner, document, document.files[0]),
    ).rejects.toBe(failure);
  });

  it('should report a vanished document as an integrity error', async () => {
    findByIdWithFiles.mockResolvedValue(null);

    await expect(gate.loadDocumentWithLatestFile(55)).rejects.toBeInstanceOf(
      AccessRequestIntegrityError,
    );
  });
});

import { Readable } from 'stream';
import { PersonRepositoryPort } from '../../src/persons/domain/repositories/person.repository.port';
import { Person } from '../../src/persons/domain/entities/person.entity';
import { IssuingEntityRepositoryPort } from '../../src/issuing-entities/domain/repositories/issuing-entity.repository.port';
import { IssuingEntity } from '../../src/issuing-entities/domain/entities/issuing-entity.entity';
import { PersonDocumentRepositoryPort } from '../../src/person-documents/domain/repositories/person-document.repository.port';
import { PersonDocument } from '../../src/person-documents/domain/entities/person-document.entity';
import { FileRecord } from '../../src/person-documents/domain/entities/file-record.entity';
import { ReviewStatus } from '../../src/person-documents/domain/enums/review-status.enum';
import { selectLatestFile } from '../../src/person-documents/domain/utils/latest-file.util';
import {
  FileStoragePort,
  StoredFileHandle,
} from '../../src/person-documents/domain/ports/file-storage.port';
import {
  AccessRequestDecision,
  AccessRequestRepositoryPort,
  NewAccessRequest,
} from '../../src/access-requests/domain/repositories/access-request.repository.port';
import { AccessRequest } from '../../src/access-requests/domain/entities/access-request.entity';
import { AccessRequestStatus } from '../../src/access-requests/domain/enums/access-request-status.enum';
import { LedgerSyncPort } from '../../src/ledger/domain/ports/ledger-sync.port';
import { LedgerQueryPort } from '../../src/ledger/domain/ports/ledger-query.port';
import { CredentialIssuancePort } from '../../src/ledger/domain/ports/credential-issuance.port';
import {
  LedgerDocumentView,
  LedgerIdentity,
} from '../../src/ledger/domain/entities/ledger-document-view.entity';
import { ToolRunResult } from '../../src/external-tools/utils/tool-output.util';
import { ClockPort } from '../../src/utils/clock/clock.port';

export const TEST_NETWORK_NAME = 'Test Network';
export const LEDGER_RECORDED_AT = '2025-01-18T08:30:00.000Z';

export class InMemoryPersonRepository extends PersonRepositoryPort {
  readonly persons = new Map<number, Person>();

  async findById(id: number): Promise<Person | null> {
    return this.persons.get(id) ?? null;
  }

  findByIdentity(identity: LedgerIdentity): Person | undefined {
    return [...this.persons.values()].find(
      (person) =>
        person.idType === identity.idType &&
        person.idNumber === identity.idNumber,
    );
  }
}

export class InMemoryIssuingEntityRepository extends IssuingEntityRepositoryPort {
  readonly entities = new Map<number, IssuingEntity>();

  async findById(id: number): Promise<IssuingEntity | null> {
    return this.entities.get(id) ?? null;
  }
}

export class InMemoryPersonDocumentRepository extends PersonDocumentRepositoryPort {
  readonly documents = new Map<number, PersonDocument>();

  async findByIdWithFiles(id: number): Promise<PersonDocument | null> {
    return this.documents.get(id) ?? null;
  }

  async findApprovedByPersonId(personId: number): Promise<PersonDocument[]> {
    return [...this.documents.values()]
      .filter(
        (document) =>
          document.personId === personId &&
          document.reviewStatus === ReviewStatus.APPROVED,
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}

const cloneRequest = (request: AccessRequest): AccessRequest => ({
  ...request,
  items: request.items.map((item) => ({ ...item })),
});

const newestFirst = (a: AccessRequest, b: AccessRequest) =>
  b.requestedAt.getTime() - a.requestedAt.getTime() || b.id - a.id;

export class InMemoryAccessRequestRepository extends AccessRequestRepositoryPort {
  private readonly requests = new Map<number, AccessRequest>();
  private nextId = 1;
  private nextItemId = 1;

  constructor(private readonly documents: InMemoryPersonDocumentRepository) {
    super();
  }

  async createWithItems(request: NewAccessRequest): Promise<AccessRequest> {
    const { personDocumentIds, ...fields } = request;
    const id = this.nextId++;
    const created: AccessRequest = {
      ...fields,
      id,
      items: personDocumentIds.map((personDocumentId) => ({
        id: this.nextItemId++,
        accessRequestId: id,
        personDocumentId,
        documentTitle:
          this.documents.documents.get(personDocumentId)?.title ?? null,
      })),
    };
    this.requests.set(id, created);
    return cloneRequest(created);
  }

  async findByIdWithItems(id: number): Promise<AccessRequest | null> {
    const request = this.requests.get(id);
    return request ? cloneRequest(request) : null;
  }

  async findByOwnerPersonId(personId: number): Promise<AccessRequest[]> {
    return [...this.requests.values()]
      .filter((request) => request.ownerPersonId === personId)
      .sort(newestFirst)
      .map(cloneRequest);
  }

  async findByRequesterEntityId(entityId: number): Promise<AccessRequest[]> {
    return [...this.requests.values()]
      .filter((request) => request.requesterEntityId === entityId)
      .sort(newestFirst)
      .map(cloneRequest);
  }

  async applyDecisionIfPending(
    id: number,
    decision: AccessRequestDecision,
  ): Promise<boolean> {
    const current = this.requests.get(id);
    if (!current || current.status !== AccessRequestStatus.PENDING) {
      return false;
    }
    this.requests.set(id, { ...current, ...decision });
    return true;
  }
}

const toolRun = (
  command: string,
  overrides: Partial<ToolRunResult> = {},
): ToolRunResult => ({
  command,
  workdir: '/opt/ledger/client',
  exitCode: 0,
  stdout: '',
  stderr: '',
  timedOut: false,
  durationMs: 5,
  ok: true,
  reason: null,
  ...overrides,
});

/**
 * Stands in for both ledger tools. A sync registers the latest file of
 * every approved document of the identity, as the real sync tool does.
 */
export class FakeLedger implements LedgerSyncPort, LedgerQueryPort {
  readonly records = new Map<string, LedgerDocumentView[]>();
  syncFailure: string | null = null;
  syncCalls = 0;

  constructor(
    private readonly persons: InMemoryPersonRepository,
    private readonly documents: InMemoryPersonDocumentRepository,
  ) {}

  async syncIdentity(identity: LedgerIdentity): Promise<ToolRunResult> {
    this.syncCalls++;
    const command = `node sync-db-to-ledger.js --person ${identity.idType} ${identity.idNumber}`;
    if (this.syncFailure) {
      return toolRun(command, {
        ok: false,
        exitCode: 1,
        stderr: this.syncFailure,
        reason: this.syncFailure,
      });
    }
    await this.register(identity);
    return toolRun(command, { stdout: 'sync complete\n' });
  }

  async syncAll(): Promise<ToolRunResult> {
    this.syncCalls++;
    for (const person of this.persons.persons.values()) {
      await this.register({ idType: person.idType, idNumber: person.idNumber });
    }
    return toolRun('node sync-db-to-ledger.js --all', {
      stdout: 'sync complete\n',
    });
  }

  async listDocuments(identity: LedgerIdentity): Promise<LedgerDocumentView[]> {
    return [...(this.records.get(FakeLedger.keyOf(identity)) ?? [])];
  }

  async findDocumentById(
    identity: LedgerIdentity,
    docId: string,
  ): Promise<LedgerDocumentView | null> {
    const records = await this.listDocuments(identity);
    return records.find((record) => record.docId === docId) ?? null;
  }

  private async register(identity: LedgerIdentity): Promise<void> {
    const person = this.persons.findByIdentity(identity);
    if (!person) {
      return;
    }
    const approved = await this.documents.findApprovedByPersonId(person.id);
    const records: LedgerDocumentView[] = [];
    for (const document of approved) {
      const file = selectLatestFile(document.files);
      if (!file) {
        continue;
      }
      records.push({
        docId: `tx-${document.id}-${file.id}`,
        title: document.title ?? '',
        issuingEntity: TEST_NETWORK_NAME,
        status: 'Registered',
        createdAt: LEDGER_RECORDED_AT,
        sizeBytes: file.byteSize,
        filePath: `/ledger/files/${file.storagePath ?? ''}`,
      });
    }
    this.records.set(FakeLedger.keyOf(identity), records);
  }

  private static keyOf(identity: LedgerIdentity): string {
    return `${identity.idType}:${identity.idNumber}`;
  }
}

export class FakeCredentialIssuance extends CredentialIssuancePort {
  async issueCredentials(): Promise<ToolRunResult> {
    return toolRun('python3 issue_credentials.py', {
      stdout: 'issued 2 credentials\n',
    });
  }
}

export class InMemoryFileStorage extends FileStoragePort {
  readonly contents = new Map<string, Buffer>();

  async open(file: FileRecord): Promise<StoredFileHandle> {
    const content = this.contents.get(file.storagePath ?? '');
    if (!content) {
      throw new Error(`No content stored for file ${file.id}`);
    }
    return {
      fileName: file.originalName ?? 'document',
      mimeType: file.mimeType ?? 'application/octet-stream',
      byteSize: content.length,
      openStream: () => Readable.from(content),
    };
  }
}

export class FakeClock extends ClockPort {
  constructor(public current: Date) {
    super();
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

import { IdType } from '../../src/persons/domain/enums/id-type.enum';
import { ReviewStatus } from '../../src/person-documents/domain/enums/review-status.enum';
import { DisclosureTestContext } from './disclosure-test-app';

export const OWNER_ID = 7;
export const OTHER_PERSON_ID = 8;
export const REQUESTER_ID = 3;
export const OTHER_ENTITY_ID = 4;

export const ID_CARD_ID = 55;
export const DIPLOMA_ID = 56;
export const UNREVIEWED_ID = 57;
export const FOREIGN_DOCUMENT_ID = 60;

export const DIPLOMA_CONTENT = 'Bachelor of Science, awarded 2019';

/**
 * Two persons, two organizations and four documents:
 * - 55 National ID card (person 7, approved, two versions)
 * - 56 Diploma (person 7, approved, plain text file)
 * - 57 Utility bill (person 7, still under review)
 * - 60 Passport (person 8, approved)
 */
export function seedDisclosureData(context: DisclosureTestContext): void {
  const createdAt = new Date('2024-12-01T00:00:00.000Z');

  context.persons.persons.set(OWNER_ID, {
    id: OWNER_ID,
    idType: IdType.CC,
    idNumber: '1001',
    firstName: 'Ana',
    lastName: 'Tester',
    createdAt,
  });
  context.persons.persons.set(OTHER_PERSON_ID, {
    id: OTHER_PERSON_ID,
    idType: IdType.CE,
    idNumber: '2002',
    firstName: 'Ben',
    lastName: 'Tester',
    createdAt,
  });

  context.entities.entities.set(REQUESTER_ID, {
    id: REQUESTER_ID,
    name: 'Acme Staffing',
    status: 'approved',
    createdAt,
  });
  context.entities.entities.set(OTHER_ENTITY_ID, {
    id: OTHER_ENTITY_ID,
    name: 'Other Corp',
    status: 'approved',
    createdAt,
  });

  context.documents.documents.set(ID_CARD_ID, {
    id: ID_CARD_ID,
    personId: OWNER_ID,
    title: 'National ID card',
    issuerEntityId: null,
    reviewStatus: ReviewStatus.APPROVED,
    createdAt: new Date('2025-01-10T08:00:00.000Z'),
    files: [
      {
        id: 91,
        personDocumentId: ID_CARD_ID,
        originalName: 'cedula-old.pdf',
        mimeType: 'application/pdf',
        byteSize: 1200,
        sha256Hex: null,
        storagePath: 'persons/7/cedula_v1.pdf',
        version: 1,
        uploadedAt: new Date('2025-01-10T08:00:00.000Z'),
      },
      {
        id: 92,
        personDocumentId: ID_CARD_ID,
        originalName: 'cedula.pdf',
        mimeType: 'application/pdf',
        byteSize: 1536,
        sha256Hex: null,
        storagePath: 'persons/7/cedula_v2.pdf',
        version: 2,
        uploadedAt: new Date('2025-01-15T09:30:00.000Z'),
      },
    ],
  });
  context.documents.documents.set(DIPLOMA_ID, {
    id: DIPLOMA_ID,
    personId: OWNER_ID,
    title: 'Diploma',
    issuerEntityId: REQUESTER_ID,
    reviewStatus: ReviewStatus.APPROVED,
    createdAt: new Date('2025-01-11T08:00:00.000Z'),
    files: [
      {
        id: 93,
        personDocumentId: DIPLOMA_ID,
        originalName: 'diploma.txt',
        mimeType: 'text/plain',
        byteSize: DIPLOMA_CONTENT.length,
        sha256Hex: null,
        storagePath: 'persons/7/diploma.txt',
        version: null,
        uploadedAt: new Date('2025-01-11T08:00:00.000Z'),
      },
    ],
  });
  context.documents.documents.set(UNREVIEWED_ID, {
    id: UNREVIEWED_ID,
    personId: OWNER_ID,
    title: 'Utility bill',
    issuerEntityId: null,
    reviewStatus: ReviewStatus.PENDING,
    createdAt: new Date('2025-01-12T08:00:00.000Z'),
    files: [],
  });
  context.documents.documents.set(FOREIGN_DOCUMENT_ID, {
    id: FOREIGN_DOCUMENT_ID,
    personId: OTHER_PERSON_ID,
    title: 'Passport',
    issuerEntityId: null,
    reviewStatus: ReviewStatus.APPROVED,
    createdAt: new Date('2025-01-13T08:00:00.000Z'),
    files: [],
  });

  context.storage.contents.set(
    'persons/7/cedula_v2.pdf',
    Buffer.from('%PDF-1.4 test card'),
  );
  context.storage.contents.set(
    'persons/7/diploma.txt',
    Buffer.from(DIPLOMA_CONTENT),
  );
}

import { ReviewStatus } from '../enums/review-status.enum';
import { FileRecord } from './file-record.entity';

/**
 * Domain entity for PersonDocument
 *
 * A document held by a person (e.g. an identity card or diploma),
 * optionally issued by an organization, with its stored file versions.
 * `title` comes from the document's definition and is what the ledger
 * records as the document title.
 */
export interface PersonDocument {
  id: number;
  personId: number;
  title: string | null;
  issuerEntityId: number | null;
  reviewStatus: ReviewStatus;
  files: FileRecord[];
  createdAt: Date;
}

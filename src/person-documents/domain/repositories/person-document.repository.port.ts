import { NullableType } from '../../../utils/types/nullable.type';
import { PersonDocument } from '../entities/person-document.entity';

/**
 * Repository Port for PersonDocument
 *
 * Reads always include the document's files and definition title.
 */
export abstract class PersonDocumentRepositoryPort {
  abstract findByIdWithFiles(id: number): Promise<NullableType<PersonDocument>>;

  /**
   * Approved documents of a person, oldest first
   */
  abstract findApprovedByPersonId(personId: number): Promise<PersonDocument[]>;
}

import { PersonDocument } from '../../../../domain/entities/person-document.entity';
import { FileRecord } from '../../../../domain/entities/file-record.entity';
import { PersonDocumentEntity } from '../entities/person-document.entity';
import { FileRecordEntity } from '../entities/file-record.entity';

export class PersonDocumentMapper {
  static toDomain(entity: PersonDocumentEntity): PersonDocument {
    return {
      id: entity.id,
      personId: entity.personId,
      title: entity.documentDefinition?.title ?? null,
      issuerEntityId: entity.issuerEntityId,
      reviewStatus: entity.reviewStatus,
      files: (entity.files ?? []).map((file) =>
        PersonDocumentMapper.fileToDomain(file),
      ),
      createdAt: entity.createdAt,
    };
  }

  static fileToDomain(entity: FileRecordEntity): FileRecord {
    return {
      id: entity.id,
      personDocumentId: entity.personDocumentId,
      originalName: entity.originalName,
      mimeType: entity.mimeType,
      byteSize: entity.byteSize === null ? null : Number(entity.byteSize),
      sha256Hex: entity.sha256Hex,
      storagePath: entity.storagePath,
      version: entity.version,
      uploadedAt: entity.uploadedAt,
    };
  }
}

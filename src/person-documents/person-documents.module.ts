import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DocumentDefinitionEntity } from './infrastructure/persistence/relational/entities/document-definition.entity';
import { PersonDocumentEntity } from './infrastructure/persistence/relational/entities/person-document.entity';
import { FileRecordEntity } from './infrastructure/persistence/relational/entities/file-record.entity';
import { PersonDocumentRepositoryPort } from './domain/repositories/person-document.repository.port';
import { PersonDocumentRelationalRepository } from './infrastructure/persistence/relational/repositories/person-document.repository';
import { FileStoragePort } from './domain/ports/file-storage.port';
import { LocalFileStorageAdapter } from './infrastructure/storage/local-file-storage.adapter';
import { PersonDocumentsService } from './person-documents.service';
import { PersonDocumentsController } from './person-documents.controller';
import { PersonsModule } from '../persons/persons.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      DocumentDefinitionEntity,
      PersonDocumentEntity,
      FileRecordEntity,
    ]),
    PersonsModule,
  ],
  providers: [
    {
      provide: PersonDocumentRepositoryPort,
      useClass: PersonDocumentRelationalRepository,
    },
    {
      provide: FileStoragePort,
      useClass: LocalFileStorageAdapter,
    },
    PersonDocumentsService,
  ],
  controllers: [PersonDocumentsController],
  exports: [PersonDocumentRepositoryPort, FileStoragePort],
})
export class PersonDocumentsModule {}

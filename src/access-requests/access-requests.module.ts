import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AccessRequestEntity } from './infrastructure/persistence/relational/entities/access-request.entity';
import { AccessRequestItemEntity } from './infrastructure/persistence/relational/entities/access-request-item.entity';
import { AccessRequestRepositoryPort } from './domain/repositories/access-request.repository.port';
import { AccessRequestRelationalRepository } from './infrastructure/persistence/relational/repositories/access-request.repository';
import { AccessRequestDomainService } from './domain/services/access-request.domain.service';
import { LedgerConsistencyGate } from './domain/services/ledger-consistency-gate.domain.service';
import { AccessRequestsService } from './access-requests.service';
import { AccessRequestsController } from './access-requests.controller';
import { PersonsModule } from '../persons/persons.module';
import { IssuingEntitiesModule } from '../issuing-entities/issuing-entities.module';
import { PersonDocumentsModule } from '../person-documents/person-documents.module';
import { LedgerModule } from '../ledger/ledger.module';
import { AuditModule } from '../audit/audit.module';
import { KeyedLock } from '../utils/keyed-lock';

@Module({
  imports: [
    // Database
    TypeOrmModule.forFeature([AccessRequestEntity, AccessRequestItemEntity]),

    PersonsModule, // For PersonRepositoryPort
    IssuingEntitiesModule, // For IssuingEntityRepositoryPort
    PersonDocumentsModule, // For PersonDocumentRepositoryPort and FileStoragePort
    LedgerModule, // For ledger ports and DocumentLedgerMatcher
    AuditModule,
  ],
  providers: [
    {
      provide: AccessRequestRepositoryPort,
      useClass: AccessRequestRelationalRepository,
    },
    KeyedLock, // one instance: serializes ledger work per identity
    LedgerConsistencyGate,
    AccessRequestDomainService,
    AccessRequestsService,
  ],
  controllers: [AccessRequestsController],
  exports: [AccessRequestDomainService],
})
export class AccessRequestsModule {}

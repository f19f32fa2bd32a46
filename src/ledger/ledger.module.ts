import { Module } from '@nestjs/common';
import { ExternalToolsModule } from '../external-tools/external-tools.module';
import { AuditModule } from '../audit/audit.module';
import { LedgerSyncPort } from './domain/ports/ledger-sync.port';
import { LedgerQueryPort } from './domain/ports/ledger-query.port';
import { CredentialIssuancePort } from './domain/ports/credential-issuance.port';
import { LedgerSyncCliAdapter } from './infrastructure/cli/ledger-sync-cli.adapter';
import { LedgerQueryCliAdapter } from './infrastructure/cli/ledger-query-cli.adapter';
import { CredentialIssuanceCliAdapter } from './infrastructure/cli/credential-issuance-cli.adapter';
import { DocumentLedgerMatcher } from './domain/services/document-ledger-matcher.domain.service';
import { LedgerService } from './ledger.service';
import { LedgerController } from './ledger.controller';

@Module({
  imports: [ExternalToolsModule, AuditModule],
  providers: [
    { provide: LedgerSyncPort, useClass: LedgerSyncCliAdapter },
    { provide: LedgerQueryPort, useClass: LedgerQueryCliAdapter },
    { provide: CredentialIssuancePort, useClass: CredentialIssuanceCliAdapter },
    DocumentLedgerMatcher,
    LedgerService,
  ],
  controllers: [LedgerController],
  exports: [LedgerSyncPort, LedgerQueryPort, DocumentLedgerMatcher],
})
export class LedgerModule {}

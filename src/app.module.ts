import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import externalToolsConfig from './external-tools/config/external-tools.config';
import fileStorageConfig from './person-documents/config/file-storage.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { ClockModule } from './utils/clock/clock.module';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { PersonsModule } from './persons/persons.module';
import { IssuingEntitiesModule } from './issuing-entities/issuing-entities.module';
import { PersonDocumentsModule } from './person-documents/person-documents.module';
import { ExternalToolsModule } from './external-tools/external-tools.module';
import { LedgerModule } from './ledger/ledger.module';
import { AccessRequestsModule } from './access-requests/access-requests.module';

const infrastructureDatabaseModule = TypeOrmModule.forRootAsync({
  useClass: TypeOrmConfigService,
  dataSourceFactory: async (options?: DataSourceOptions) => {
    if (!options) {
      throw new Error('Database options are not configured');
    }
    return new DataSource(options).initialize();
  },
});

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        appConfig,
        authConfig,
        databaseConfig,
        externalToolsConfig,
        fileStorageConfig,
      ],
      envFilePath: ['.env'],
    }),
    infrastructureDatabaseModule,
    ClockModule,
    AuditModule,
    AuthModule,
    PersonsModule,
    IssuingEntitiesModule,
    PersonDocumentsModule,
    ExternalToolsModule,
    LedgerModule,
    AccessRequestsModule,
  ],
})
export class AppModule {}

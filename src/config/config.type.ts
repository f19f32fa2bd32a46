import { AppConfig } from './app-config.type';
import { AuthConfig } from '../auth/config/auth-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { ExternalToolsConfig } from '../external-tools/config/external-tools-config.type';
import { FileStorageConfig } from '../person-documents/config/file-storage-config.type';

export type AllConfigType = {
  app: AppConfig;
  auth: AuthConfig;
  database: DatabaseConfig;
  externalTools: ExternalToolsConfig;
  fileStorage: FileStorageConfig;
};

import { registerAs } from '@nestjs/config';
import { IsOptional, IsString } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { FileStorageConfig } from './file-storage-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  FILE_STORAGE_BASE_PATH?: string;
}

export default registerAs<FileStorageConfig>('fileStorage', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    basePath: process.env.FILE_STORAGE_BASE_PATH || './storage',
  };
});

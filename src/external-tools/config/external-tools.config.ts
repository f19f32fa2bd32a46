import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, IsString, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { ExternalToolsConfig } from './external-tools-config.type';

export const DEFAULT_TOOL_TIMEOUT_MS = 120_000;

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  EXTERNAL_TOOLS_TIMEOUT_MS?: number;

  @IsString()
  @IsOptional()
  LEDGER_NODE_BIN?: string;

  @IsString()
  @IsOptional()
  LEDGER_WORKDIR?: string;

  @IsString()
  @IsOptional()
  LEDGER_SYNC_SCRIPT?: string;

  @IsString()
  @IsOptional()
  LEDGER_LIST_SCRIPT?: string;

  @IsString()
  @IsOptional()
  LEDGER_NETWORK_NAME?: string;

  @IsString()
  @IsOptional()
  CREDENTIALS_WORKDIR?: string;

  @IsString()
  @IsOptional()
  CREDENTIALS_VENV_PATH?: string;

  @IsString()
  @IsOptional()
  CREDENTIALS_SCRIPT?: string;
}

export default registerAs<ExternalToolsConfig>('externalTools', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    timeoutMs: process.env.EXTERNAL_TOOLS_TIMEOUT_MS
      ? parseInt(process.env.EXTERNAL_TOOLS_TIMEOUT_MS, 10)
      : DEFAULT_TOOL_TIMEOUT_MS,
    ledger: {
      nodeBin: process.env.LEDGER_NODE_BIN || 'node',
      workdir: process.env.LEDGER_WORKDIR || '',
      syncScript: process.env.LEDGER_SYNC_SCRIPT || 'sync-db-to-ledger.js',
      listScript: process.env.LEDGER_LIST_SCRIPT || 'list-docs.js',
      networkName: process.env.LEDGER_NETWORK_NAME || 'Hyperledger Fabric',
    },
    credentials: {
      workdir: process.env.CREDENTIALS_WORKDIR || '',
      venvPath: process.env.CREDENTIALS_VENV_PATH || 'venv',
      script:
        process.env.CREDENTIALS_SCRIPT || 'issue_credentials_from_db.py',
    },
  };
});

export type LedgerToolConfig = {
  nodeBin: string;
  workdir: string;
  syncScript: string;
  listScript: string;
  networkName: string;
};

export type CredentialToolConfig = {
  workdir: string;
  venvPath: string;
  script: string;
};

export type ExternalToolsConfig = {
  timeoutMs: number;
  ledger: LedgerToolConfig;
  credentials: CredentialToolConfig;
};

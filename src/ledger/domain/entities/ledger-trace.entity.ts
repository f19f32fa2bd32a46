/**
 * Display form of a ledger record, every field filled.
 */
export interface LedgerTrace {
  network: string;
  blockReference: string;
  title: string;
  issuingEntity: string;
  status: string;
  createdAt: string;
  size: string;
  fileName: string;
  filePath: string;
}

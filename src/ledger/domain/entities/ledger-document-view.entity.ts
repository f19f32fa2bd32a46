/**
 * A document record as the ledger reports it for one identity.
 *
 * Read-only projection of the list tool's output. Missing text fields are
 * empty strings, except issuingEntity and status which carry display
 * defaults (see LedgerDocumentMapper).
 */
export interface LedgerDocumentView {
  docId: string;
  title: string;
  issuingEntity: string;
  status: string;
  createdAt: string; // ISO-8601 as reported, may be empty
  sizeBytes: number | null;
  filePath: string;
}

export interface LedgerIdentity {
  idType: string;
  idNumber: string;
}

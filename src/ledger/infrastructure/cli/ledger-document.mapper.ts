import { LedgerDocumentView } from '../../domain/entities/ledger-document-view.entity';

export const DEFAULT_LEDGER_STATUS = 'Registered';

const asText = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
};

const asByteCount = (value: unknown): number | null => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
};

export class LedgerDocumentMapper {
  /**
   * @param ledgerName - shown as issuing entity when the record names none
   */
  static toView(
    raw: Record<string, unknown>,
    ledgerName: string,
  ): LedgerDocumentView {
    const issuingEntity = asText(raw.issuingEntity).trim();
    const status = asText(raw.status).trim();

    return {
      docId: asText(raw.docId),
      title: asText(raw.title),
      issuingEntity: issuingEntity || ledgerName,
      status: status || DEFAULT_LEDGER_STATUS,
      createdAt: asText(raw.createdAt),
      sizeBytes: asByteCount(raw.sizeBytes),
      filePath: asText(raw.filePath),
    };
  }
}

import { LedgerDocumentView } from '../domain/entities/ledger-document-view.entity';
import { LedgerTrace } from '../domain/entities/ledger-trace.entity';
import { DEFAULT_LEDGER_STATUS } from '../infrastructure/cli/ledger-document.mapper';

export const NOT_AVAILABLE = 'Not available';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'];

const orFallback = (value: string | null | undefined, fallback: string) =>
  value && value.trim() ? value : fallback;

/**
 * "2025-01-20 10:30 UTC" for ISO input; unparseable input is returned as is.
 */
export function formatLedgerTimestamp(createdAt: string): string {
  if (!createdAt.trim()) {
    return NOT_AVAILABLE;
  }
  const parsed = new Date(createdAt);
  if (Number.isNaN(parsed.getTime())) {
    return createdAt;
  }
  return `${parsed.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

/**
 * 1024-based size with two decimals above bytes, e.g. "1.50 KB".
 */
export function formatByteSize(sizeBytes: number | null): string {
  if (sizeBytes === null || sizeBytes <= 0) {
    return NOT_AVAILABLE;
  }
  if (sizeBytes < 1024) {
    return `${sizeBytes} B`;
  }
  let value = sizeBytes / 1024;
  let unit = 1;
  // The unit follows the rounded value.
  while (
    Math.round(value * 100) / 100 >= 1024 &&
    unit < SIZE_UNITS.length - 1
  ) {
    value /= 1024;
    unit++;
  }
  return `${(Math.round(value * 100) / 100).toFixed(2)} ${SIZE_UNITS[unit]}`;
}

export function fileNameOf(filePath: string): string {
  const segments = filePath.trim().replace(/\\/g, '/').split('/');
  return segments[segments.length - 1] || 'document';
}

export function toLedgerTrace(
  doc: LedgerDocumentView,
  networkName: string,
): LedgerTrace {
  return {
    network: networkName,
    blockReference: orFallback(doc.docId, 'No reference'),
    title: orFallback(doc.title, 'Untitled document'),
    issuingEntity: orFallback(doc.issuingEntity, 'Unknown issuer'),
    status: orFallback(doc.status, DEFAULT_LEDGER_STATUS),
    createdAt: formatLedgerTimestamp(doc.createdAt),
    size: formatByteSize(doc.sizeBytes),
    fileName: fileNameOf(doc.filePath),
    filePath: orFallback(doc.filePath, NOT_AVAILABLE),
  };
}

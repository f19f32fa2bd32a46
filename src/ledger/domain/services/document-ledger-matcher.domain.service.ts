import { Injectable } from '@nestjs/common';
import { LedgerDocumentView } from '../entities/ledger-document-view.entity';

export interface LocalDocumentRef {
  title: string | null;
}

export interface LocalFileRef {
  storagePath: string | null;
}

/**
 * Document–Ledger Matcher
 *
 * Decides which ledger record, if any, corresponds to a local document's
 * latest file.
 *
 * Matching rules:
 * 1. Path: after trimming and turning "\" into "/", the ledger path equals
 *    the local path or ends with it. Blank paths never match.
 * 2. Title: trimmed, case-insensitive equality of non-blank titles.
 *    Consulted only when no ledger record matches by path.
 *
 * The first record in ledger order wins within each rule.
 */
@Injectable()
export class DocumentLedgerMatcher {
  findMatch(
    ledgerDocs: ReadonlyArray<LedgerDocumentView | null | undefined>,
    localDoc: LocalDocumentRef,
    localFile: LocalFileRef | null,
  ): LedgerDocumentView | null {
    const candidates = ledgerDocs.filter(
      (doc): doc is LedgerDocumentView => doc !== null && doc !== undefined,
    );

    const localPath = DocumentLedgerMatcher.normalizePath(
      localFile?.storagePath,
    );
    if (localPath) {
      const byPath = candidates.find((doc) =>
        DocumentLedgerMatcher.pathMatches(doc.filePath, localPath),
      );
      if (byPath) {
        return byPath;
      }
    }

    const localTitle = (localDoc.title ?? '').trim().toLowerCase();
    if (!localTitle) {
      return null;
    }
    return (
      candidates.find(
        (doc) => (doc.title ?? '').trim().toLowerCase() === localTitle,
      ) ?? null
    );
  }

  static normalizePath(value: string | null | undefined): string {
    return (value ?? '').trim().replace(/\\/g, '/');
  }

  private static pathMatches(ledgerPath: string, localPath: string): boolean {
    const normalized = DocumentLedgerMatcher.normalizePath(ledgerPath);
    if (!normalized) {
      return false;
    }
    // A suffix match subsumes both equality and "/<local path>".
    return normalized.endsWith(localPath);
  }
}

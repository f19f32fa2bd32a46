/**
 * One stored version of a person document's file.
 */
export interface FileRecord {
  id: number;
  personDocumentId: number;
  originalName: string | null;
  mimeType: string | null;
  byteSize: number | null;
  sha256Hex: string | null;
  storagePath: string | null; // relative to fileStorage.basePath
  version: number | null; // null is treated as 0
  uploadedAt: Date;
}

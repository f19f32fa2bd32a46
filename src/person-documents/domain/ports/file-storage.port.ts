import { Readable } from 'stream';
import { FileRecord } from '../entities/file-record.entity';

/**
 * Handle to a stored file. Content is only read when the stream is opened.
 */
export interface StoredFileHandle {
  fileName: string;
  mimeType: string;
  byteSize: number | null;
  openStream(): Readable;
}

export abstract class FileStoragePort {
  /**
   * Resolve a file record to its stored content.
   * Throws NotFoundException when the blob is missing.
   */
  abstract open(file: FileRecord): Promise<StoredFileHandle>;
}

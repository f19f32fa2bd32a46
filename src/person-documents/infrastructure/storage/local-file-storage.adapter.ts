import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { FileRecord } from '../../domain/entities/file-record.entity';
import {
  FileStoragePort,
  StoredFileHandle,
} from '../../domain/ports/file-storage.port';

/**
 * Local File Storage Adapter
 *
 * Stored paths are relative to fileStorage.basePath. A path that resolves
 * outside the base directory is treated as missing.
 *
 * Security:
 * - Never log resolved paths at INFO level (they contain identity numbers)
 */
@Injectable()
export class LocalFileStorageAdapter extends FileStoragePort {
  private readonly logger = new Logger(LocalFileStorageAdapter.name);
  private readonly basePath: string;

  constructor(configService: ConfigService<AllConfigType>) {
    super();
    this.basePath = path.resolve(
      configService.getOrThrow('fileStorage.basePath', { infer: true }),
    );
  }

  async open(file: FileRecord): Promise<StoredFileHandle> {
    const absolutePath = this.resolveInsideBase(file.storagePath);
    if (!absolutePath) {
      this.logger.warn(`File ${file.id} has an unusable storage path`);
      throw new NotFoundException('Stored file not found');
    }

    let size: number;
    try {
      const stats = await fs.stat(absolutePath);
      if (!stats.isFile()) {
        throw new NotFoundException('Stored file not found');
      }
      size = stats.size;
    } catch (error) {
      if (error instanceof NotFoundException) {
        throw error;
      }
      this.logger.warn(`File ${file.id} is missing from storage`);
      throw new NotFoundException('Stored file not found');
    }

    return {
      fileName: file.originalName || path.basename(absolutePath),
      mimeType: file.mimeType || 'application/octet-stream',
      byteSize: size,
      openStream: () => createReadStream(absolutePath),
    };
  }

  private resolveInsideBase(storagePath: string | null): string | null {
    const relative = storagePath?.trim().replace(/\\/g, '/');
    if (!relative) {
      return null;
    }

    const absolutePath = path.resolve(this.basePath, relative);
    if (!absolutePath.startsWith(this.basePath + path.sep)) {
      return null;
    }
    return absolutePath;
  }
}

import { FileRecord } from '../entities/file-record.entity';

/**
 * The file with the highest version; a missing version counts as 0.
 * On ties the earliest file in the list wins.
 */
export function selectLatestFile(files: FileRecord[]): FileRecord | null {
  let latest: FileRecord | null = null;
  for (const file of files) {
    if (!latest || (file.version ?? 0) > (latest.version ?? 0)) {
      latest = file;
    }
  }
  return latest;
}

import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { DuplicateFileError, InvalidCatalogEntryError, errorMessage } from './errors';
import type { DownloadFile } from './types';

/**
 * Files the operator offers for download, in the order they were added.
 * Append-only: entries are never edited or removed.
 */
export class DownloadCatalog {
  private readonly files: DownloadFile[] = [];

  add(file: DownloadFile): void {
    if (this.find(file.displayName)) {
      throw new DuplicateFileError(file.displayName);
    }
    this.files.push({ ...file });
  }

  list(): readonly DownloadFile[] {
    return this.files.slice();
  }

  /**
   * Exact, case-sensitive lookup by display name.
   */
  find(displayName: string): DownloadFile | undefined {
    return this.files.find((file) => file.displayName === displayName);
  }

  isEmpty(): boolean {
    return this.files.length === 0;
  }

  get size(): number {
    return this.files.length;
  }
}

export function toKilobytes(bytes: number): number {
  return Math.ceil(bytes / 1024);
}

/**
 * Build the catalog entry for a file on disk.
 * Rejects missing paths and directories.
 */
export async function describeDownloadFile(filePath: string): Promise<DownloadFile> {
  const absolutePath = path.resolve(filePath);

  let stats: Stats;
  try {
    stats = await fs.stat(absolutePath);
  } catch (err) {
    throw new InvalidCatalogEntryError(absolutePath, errorMessage(err));
  }
  if (!stats.isFile()) {
    throw new InvalidCatalogEntryError(absolutePath, 'not a regular file');
  }

  return {
    displayName: path.basename(absolutePath),
    absolutePath,
    sizeInKB: toKilobytes(stats.size),
  };
}

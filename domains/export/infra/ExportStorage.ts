import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';

import { getLogger, toError } from '@kernel/logger';
import { ExportInitError } from '@errors';

const logger = getLogger('export:storage');

export const EXPORT_FILENAME_PREFIX = 'tentapress-export-';

/**
* Compact UTC timestamp, e.g. 20260304-050607
*/
export function compactUtcTimestamp(date: Date): string {
  const iso = date.toISOString();
  const day = iso.slice(0, 10).replace(/-/g, '');
  const time = iso.slice(11, 19).replace(/:/g, '');
  return `${day}-${time}`;
}

/**
* Filename for the given clock reading; attempts after the first get a
* counter suffix starting at 2
*/
export function exportFilename(date: Date, attempt = 1): string {
  const suffix = attempt > 1 ? `-${attempt}` : '';
  return `${EXPORT_FILENAME_PREFIX}${compactUtcTimestamp(date)}${suffix}.zip`;
}

/**
* An exclusively created, empty file the caller now owns
*/
export interface ReservedFile {
  path: string;
  filename: string;
  handle: FileHandle;
}

export interface ExportStorageOptions {
  directory: string;
  maxFilenameAttempts: number;
}

/**
* Staging directory for export archives
*/
export class ExportStorage {
  constructor(private readonly options: ExportStorageOptions) {}

  get directory(): string {
    return this.options.directory;
  }

  /**
  * Ensure the directory exists and create a new file named after `now`.
  * Existing files are never overwritten: a same-second collision moves on
  * to the next counter suffix.
  *
  * @throws {ExportInitError} When the directory or the file cannot be created
  */
  async reserve(now: Date): Promise<ReservedFile> {
    try {
      await mkdir(this.options.directory, { recursive: true });
    } catch (error: unknown) {
      const err = toError(error);
      logger.error('Failed to create export directory', err, { directory: this.options.directory });
      throw new ExportInitError(undefined, { directory: this.options.directory }, err);
    }

    const attempts = Math.max(1, this.options.maxFilenameAttempts);
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const filename = exportFilename(now, attempt);
      const filePath = path.join(this.options.directory, filename);
      try {
        const handle = await open(filePath, 'wx');
        return { path: filePath, filename, handle };
      } catch (error: unknown) {
        if (isAlreadyExists(error)) {
          logger.debug('Export filename taken, trying next suffix', { filename });
          continue;
        }
        const err = toError(error);
        logger.error('Failed to create export file', err, { path: filePath });
        throw new ExportInitError(undefined, { path: filePath }, err);
      }
    }

    logger.error('No free export filename', undefined, { attempts, directory: this.options.directory });
    throw new ExportInitError(undefined, { attempts, directory: this.options.directory });
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

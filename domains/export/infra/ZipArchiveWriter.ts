import { unlink } from 'node:fs/promises';
import JSZip from 'jszip';

import { getLogger, toError } from '@kernel/logger';
import { ExportWriteError } from '@errors';

import type { ArchiveFactory, ArchiveWriter } from '../application/ports/ArchiveWriter';
import type { ExportStorage, ReservedFile } from './ExportStorage';

const logger = getLogger('export:zip');

type WriterState = 'open' | 'sealed' | 'aborted';

/**
* Zip container over a reserved file.
*
* Entries are held in a JSZip instance and the compressed archive is
* written to the file handle in one go on `finalize`.
*/
export class ZipArchiveWriter implements ArchiveWriter {
  private readonly zip = new JSZip();
  private readonly names: string[] = [];
  private state: WriterState = 'open';
  private handleClosed = false;

  constructor(private readonly file: ReservedFile) {}

  get path(): string {
    return this.file.path;
  }

  get filename(): string {
    return this.file.filename;
  }

  addEntry(name: string, content: string): void {
    if (this.state !== 'open') {
      throw new Error(`Cannot add ${name}: archive is ${this.state}`);
    }
    this.zip.file(name, content);
    this.names.push(name);
  }

  entryNames(): string[] {
    return [...this.names];
  }

  async finalize(): Promise<void> {
    if (this.state !== 'open') {
      throw new Error(`Cannot finalize: archive is ${this.state}`);
    }
    this.state = 'sealed';

    try {
      const buffer = await this.zip.generateAsync({
        type: 'nodebuffer',
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
      });
      await this.file.handle.writeFile(buffer);
      await this.closeHandle();
    } catch (error: unknown) {
      const err = toError(error);
      logger.error('Failed to finalize export archive', err, { path: this.file.path });
      this.state = 'aborted';
      await this.release();
      throw new ExportWriteError(undefined, { path: this.file.path }, err);
    }
  }

  async abort(): Promise<void> {
    if (this.state === 'aborted') return;
    this.state = 'aborted';
    await this.release();
  }

  private async closeHandle(): Promise<void> {
    if (this.handleClosed) return;
    this.handleClosed = true;
    await this.file.handle.close();
  }

  /** Close the handle and unlink the file */
  private async release(): Promise<void> {
    try {
      await this.closeHandle();
    } catch (error: unknown) {
      logger.warn('Failed to close export file', { path: this.file.path, error: toError(error).message });
    }
    try {
      await unlink(this.file.path);
    } catch (error: unknown) {
      logger.warn('Failed to remove partial export file', { path: this.file.path, error: toError(error).message });
    }
  }
}

/**
* Opens zip containers in the export storage directory
*/
export class ZipArchiveFactory implements ArchiveFactory {
  constructor(private readonly storage: ExportStorage) {}

  async create(now: Date): Promise<ArchiveWriter> {
    const file = await this.storage.reserve(now);
    return new ZipArchiveWriter(file);
  }
}

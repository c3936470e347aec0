import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ExportInitError } from '@errors';

import { ExportStorage, compactUtcTimestamp, exportFilename } from '../ExportStorage';

const now = new Date(Date.UTC(2026, 0, 9, 8, 7, 6));

describe('export filenames', () => {
  it('should format a compact UTC timestamp', () => {
    expect(compactUtcTimestamp(now)).toBe('20260109-080706');
  });

  it('should suffix attempts after the first', () => {
    expect(exportFilename(now)).toBe('tentapress-export-20260109-080706.zip');
    expect(exportFilename(now, 2)).toBe('tentapress-export-20260109-080706-2.zip');
  });
});

describe('ExportStorage', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'export-storage-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should create the directory and an empty file', async () => {
    const directory = path.join(root, 'storage', 'app', 'tp-exports');
    const storage = new ExportStorage({ directory, maxFilenameAttempts: 3 });

    const file = await storage.reserve(now);
    await file.handle.close();

    expect(file.filename).toBe('tentapress-export-20260109-080706.zip');
    expect(file.path).toBe(path.join(directory, file.filename));
    expect((await stat(file.path)).size).toBe(0);
  });

  it('should never overwrite an existing export from the same second', async () => {
    await writeFile(path.join(root, 'tentapress-export-20260109-080706.zip'), 'earlier');
    const storage = new ExportStorage({ directory: root, maxFilenameAttempts: 3 });

    const second = await storage.reserve(now);
    const third = await storage.reserve(now);
    await second.handle.close();
    await third.handle.close();

    expect(second.filename).toBe('tentapress-export-20260109-080706-2.zip');
    expect(third.filename).toBe('tentapress-export-20260109-080706-3.zip');
  });

  it('should fail once every suffix is taken', async () => {
    const storage = new ExportStorage({ directory: root, maxFilenameAttempts: 2 });
    await writeFile(path.join(root, exportFilename(now, 1)), '');
    await writeFile(path.join(root, exportFilename(now, 2)), '');

    await expect(storage.reserve(now)).rejects.toBeInstanceOf(ExportInitError);
    expect((await readdir(root)).sort()).toEqual([exportFilename(now, 1), exportFilename(now, 2)]);
  });

  it('should fail with ExportInitError when the directory cannot be created', async () => {
    const blocker = path.join(root, 'not-a-directory');
    await writeFile(blocker, '');
    const storage = new ExportStorage({ directory: path.join(blocker, 'exports'), maxFilenameAttempts: 1 });

    const error = await storage.reserve(now).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExportInitError);
    expect(error).toMatchObject({ code: 'EXPORT_INIT_FAILED', statusCode: 500, message: 'Unable to create export zip.' });
    expect(await readdir(root)).toEqual(['not-a-directory']);
  });
});

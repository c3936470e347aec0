/**
 * POST /admin/export: flag parsing, download headers, archive cleanup and
 * the error shapes
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';

import { ExportInitError } from '@errors';
import { getRequestContext } from '@kernel/request-context';

import { buildApp } from '../../app';
import { ExportRequestSchema, toExportOptions } from '../export';
import type { ArchiveResult, ExportOptions } from '@domain/export/domain/types';

async function exists(file: string): Promise<boolean> {
  return access(file).then(() => true, () => false);
}

describe('ExportRequestSchema', () => {
  it('should accept the boolean spellings forms and JSON clients send', () => {
    const parsed = ExportRequestSchema.parse({
      include_settings: '0',
      include_theme: 1,
      include_plugins: 'false',
      include_seo: true,
    });
    expect(toExportOptions(parsed)).toEqual({
      includeSettings: false,
      includeTheme: true,
      includePlugins: false,
      includeSeo: true,
    });
  });

  it('should leave null, empty and missing flags to the defaults', () => {
    const parsed = ExportRequestSchema.parse({ include_settings: null, include_theme: '' });
    expect(toExportOptions(parsed)).toEqual({});
  });

  it('should reject anything else', () => {
    expect(ExportRequestSchema.safeParse({ include_seo: 'yes' }).success).toBe(false);
    expect(ExportRequestSchema.safeParse({ include_seo: 2 }).success).toBe(false);
  });
});

describe('POST /admin/export', () => {
  let dir: string;
  let app: FastifyInstance;
  let archivePath: string;
  const createExport = vi.fn<[Partial<ExportOptions>?], Promise<ArchiveResult>>();

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(path.join(os.tmpdir(), 'export-route-'));
    archivePath = path.join(dir, 'tentapress-export-20260101-000000.zip');
    createExport.mockImplementation(async () => {
      await writeFile(archivePath, 'zip-bytes');
      return { path: archivePath, filename: 'tentapress-export-20260101-000000.zip' };
    });
    app = await buildApp({ exporter: { createExport } });
  });

  afterEach(async () => {
    await app.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('should stream the archive as a download and delete it afterwards', async () => {
    const response = await app.inject({ method: 'POST', url: '/admin/export' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/zip');
    expect(response.headers['content-disposition']).toBe(
      'attachment; filename="tentapress-export-20260101-000000.zip"'
    );
    expect(response.body).toBe('zip-bytes');
    expect(createExport).toHaveBeenCalledWith({});
    await vi.waitFor(async () => {
      expect(await exists(archivePath)).toBe(false);
    });
  });

  it('should pass flags from the JSON body and the query string', async () => {
    await app.inject({
      method: 'POST',
      url: '/admin/export?include_plugins=0',
      payload: { include_settings: false, include_seo: '1' },
    });

    expect(createExport).toHaveBeenCalledWith({
      includeSettings: false,
      includePlugins: false,
      includeSeo: true,
    });
  });

  it('should accept flags posted as an HTML form', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/admin/export',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      payload: 'include_seo=0&include_theme=true&include_settings=',
    });

    expect(response.statusCode).toBe(200);
    expect(createExport).toHaveBeenCalledWith({ includeTheme: true, includeSeo: false });
  });

  it('should report an unsupported body type with its own code', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/admin/export',
      headers: { 'content-type': 'application/xml', 'x-request-id': 'req-415' },
      payload: '<export/>',
    });

    expect(response.statusCode).toBe(415);
    expect(response.json()).toEqual({
      error: 'Unsupported Media Type: application/xml',
      code: 'UNSUPPORTED_MEDIA_TYPE',
      requestId: 'req-415',
    });
    expect(createExport).not.toHaveBeenCalled();
  });

  it('should report malformed JSON as a validation error', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/admin/export',
      headers: { 'content-type': 'application/json', 'x-request-id': 'req-json' },
      payload: '{"include_seo":',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR', requestId: 'req-json' });
    expect(createExport).not.toHaveBeenCalled();
  });

  it('should run the export inside the request context', async () => {
    let seenRequestId: string | undefined;
    createExport.mockImplementationOnce(async () => {
      seenRequestId = getRequestContext()?.requestId;
      await writeFile(archivePath, 'zip-bytes');
      return { path: archivePath, filename: 'a.zip' };
    });

    await app.inject({ method: 'POST', url: '/admin/export', headers: { 'x-request-id': 'req-ctx-1' } });

    expect(seenRequestId).toBe('req-ctx-1');
  });

  it('should reject invalid flags with the standard error shape', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/admin/export',
      headers: { 'x-request-id': 'req-400' },
      payload: { include_theme: 'maybe' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Validation failed', code: 'VALIDATION_ERROR', requestId: 'req-400' });
    expect(createExport).not.toHaveBeenCalled();
  });

  it('should map ExportInitError to EXPORT_INIT_FAILED', async () => {
    createExport.mockRejectedValueOnce(new ExportInitError());

    const response = await app.inject({ method: 'POST', url: '/admin/export', headers: { 'x-request-id': 'req-500' } });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: 'Unable to create export archive',
      code: 'EXPORT_INIT_FAILED',
      requestId: 'req-500',
    });
  });

  it('should map any other failure to INTERNAL_ERROR without leaking the message', async () => {
    createExport.mockRejectedValueOnce(new Error('password authentication failed for user "site"'));

    const response = await app.inject({ method: 'POST', url: '/admin/export', headers: { 'x-request-id': 'req-501' } });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: 'An error occurred processing your request',
      code: 'INTERNAL_ERROR',
      requestId: 'req-501',
    });
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const response = await app.inject({ method: 'GET', url: '/admin/unknown', headers: { 'x-request-id': 'req-404' } });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Route not found', code: 'NOT_FOUND', requestId: 'req-404' });
  });
});

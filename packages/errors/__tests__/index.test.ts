/**
 * Error package: AppError hierarchy, serialization and zod issue helpers
 */

import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';

import {
  AppError,
  ErrorCodes,
  ExportInitError,
  ExportWriteError,
  extractZodIssues,
  formatZodError,
} from '../index';

describe('Error Handling Package', () => {
  afterEach(() => {
    process.env['NODE_ENV'] = 'test';
  });

  // ============================================================================
  // AppError
  // ============================================================================

  describe('AppError', () => {
    it('should default to a 500 internal error', () => {
      const error = new AppError('boom');
      expect(error.code).toBe(ErrorCodes.INTERNAL_ERROR);
      expect(error.statusCode).toBe(500);
      expect(error.name).toBe('AppError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should serialize details and request id', () => {
      const error = new AppError('Missing', ErrorCodes.NOT_FOUND, 404, { id: 3 }, 'req-1');
      expect(error.toJSON()).toEqual({ error: 'Missing', code: 'NOT_FOUND', details: { id: 3 }, requestId: 'req-1' });
    });

    it('should hide details from clients outside development', () => {
      const error = new AppError('Missing', ErrorCodes.NOT_FOUND, 404, { id: 3 });
      expect(error.toClientJSON()).toEqual({ error: 'Missing', code: 'NOT_FOUND' });

      process.env['NODE_ENV'] = 'development';
      expect(error.toClientJSON()).toEqual({ error: 'Missing', code: 'NOT_FOUND', details: { id: 3 } });
    });
  });

  // ============================================================================
  // Export errors
  // ============================================================================

  describe('ExportInitError', () => {
    it('should carry the init failure code and keep the cause', () => {
      const cause = new Error('EACCES: permission denied');
      const error = new ExportInitError(undefined, { path: '/srv/exports' }, cause);

      expect(error.message).toBe('Unable to create export zip.');
      expect(error.code).toBe('EXPORT_INIT_FAILED');
      expect(error.statusCode).toBe(500);
      expect(error.name).toBe('ExportInitError');
      expect(error.cause).toBe(cause);
      expect(error.details).toEqual({ path: '/srv/exports' });
    });
  });

  describe('ExportWriteError', () => {
    it('should carry the write failure code', () => {
      const error = new ExportWriteError();
      expect(error.message).toBe('Unable to finalize export zip.');
      expect(error.code).toBe('EXPORT_WRITE_FAILED');
      expect(error).toBeInstanceOf(AppError);
      expect(error.cause).toBeUndefined();
    });
  });

  // ============================================================================
  // Zod helpers
  // ============================================================================

  describe('extractZodIssues', () => {
    it('should read issues from a zod error', () => {
      const result = z.object({ include_seo: z.boolean() }).safeParse({ include_seo: 'yes' });
      expect(result.success).toBe(false);
      if (result.success) return;

      const issues = extractZodIssues(result.error);
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({ path: ['include_seo'], code: 'invalid_type' });
    });

    it('should return no issues for other values', () => {
      expect(extractZodIssues(new Error('x'))).toEqual([]);
      expect(extractZodIssues(null)).toEqual([]);
      expect(extractZodIssues({ issues: 'nope' })).toEqual([]);
    });

    it('should fill in missing issue fields', () => {
      expect(extractZodIssues({ issues: [{}, 'bad'] })).toEqual([
        { path: [], message: 'Invalid value', code: 'invalid_type' },
      ]);
    });
  });

  describe('formatZodError', () => {
    it('should join issue messages', () => {
      expect(formatZodError({ issues: [{ message: 'a' }, { message: 'b' }] }).message).toBe('Validation failed: a, b');
      expect(formatZodError({ issues: [] }).message).toBe('Validation failed');
    });
  });
});

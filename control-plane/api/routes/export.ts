import { createReadStream } from 'node:fs';
import { unlink } from 'node:fs/promises';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ExportInitError, formatZodError } from '@errors';
import { errors } from '@errors/responses';
import { getLogger, toError } from '@kernel/logger';
import { createRequestContext, runWithContext } from '@kernel/request-context';

import type { SiteExportService } from '../../../domains/export/application/SiteExportService';
import type { ExportOptions } from '../../../domains/export/domain/types';

const logger = getLogger('export:route');

/**
* Nullable boolean as sent by HTML forms and JSON clients.
* Unset, null and '' mean "use the default".
*/
const FlagSchema = z
  .union([
    z.boolean(),
    z.literal(1),
    z.literal(0),
    z.enum(['1', '0', 'true', 'false', '']),
    z.null(),
  ])
  .optional()
  .transform(value => (value === undefined || value === null || value === '' ? undefined : value === true || value === 1 || value === '1' || value === 'true'));

export const ExportRequestSchema = z.object({
  include_settings: FlagSchema,
  include_theme: FlagSchema,
  include_plugins: FlagSchema,
  include_seo: FlagSchema,
});

export type ExportRequest = z.infer<typeof ExportRequestSchema>;

export function toExportOptions(request: ExportRequest): Partial<ExportOptions> {
  const options: Partial<ExportOptions> = {};
  if (request.include_settings !== undefined) options.includeSettings = request.include_settings;
  if (request.include_theme !== undefined) options.includeTheme = request.include_theme;
  if (request.include_plugins !== undefined) options.includePlugins = request.include_plugins;
  if (request.include_seo !== undefined) options.includeSeo = request.include_seo;
  return options;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

export interface ExportRouteDeps {
  exporter: Pick<SiteExportService, 'createExport'>;
}

/**
* Admin export routes
*/
export async function exportRoutes(app: FastifyInstance, deps: ExportRouteDeps): Promise<void> {
  app.post('/admin/export', async (req, reply) => {
    const parseResult = ExportRequestSchema.safeParse({ ...asRecord(req.query), ...asRecord(req.body) });
    if (!parseResult.success) {
      return errors.validationFailed(reply, formatZodError(parseResult.error).issues);
    }

    const context = createRequestContext({ requestId: req.id, path: req.url, method: req.method });

    try {
      const archive = await runWithContext(context, () =>
        deps.exporter.createExport(toExportOptions(parseResult.data))
      );

      const stream = createReadStream(archive.path);
      // Delete only once the download has been sent or abandoned
      stream.once('close', () => {
        unlink(archive.path).catch((error: unknown) => {
          logger.warn('Failed to delete export archive', { path: archive.path, error: toError(error).message });
        });
      });

      return reply
        .header('Content-Type', 'application/zip')
        .header('Content-Disposition', `attachment; filename="${archive.filename}"`)
        .send(stream);
    } catch (error: unknown) {
      const err = toError(error);
      if (error instanceof ExportInitError) {
        logger.error('Export could not be started', err);
        return errors.internal(reply, 'Unable to create export archive', error.code);
      }
      logger.error('Export failed', err);
      return errors.internal(reply);
    }
  });
}

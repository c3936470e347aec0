// Validate environment variables at startup

import { getExportConfig, validateEnv, type EnvConfig } from '@config';
import { closeKnex, closePool, getKnex, getPoolInstance } from '@database';
import { getLogger, toError } from '@kernel/logger';
import { registerShutdownHandler, setupShutdownHandlers } from '@shutdown';

import { getPluginComponents, getThemeComponents } from '../services/export-components';
import { createSiteExportService } from '../services/site-export';
import { buildApp } from './app';

function loadEnv(): EnvConfig {
  try {
    return validateEnv();
  } catch (error) {
    process.stderr.write(`[startup] Environment validation failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
}

const env = loadEnv();
const port = env.PORT ?? 3000;

const logger = getLogger('http');

async function start(): Promise<void> {
  try {
    setupShutdownHandlers();

    const pool = await getPoolInstance();
    registerShutdownHandler(closePool);

    const knex = getKnex();
    registerShutdownHandler(closeKnex);

    const exporter = createSiteExportService({
      pool,
      knex,
      config: getExportConfig(),
      themeComponents: getThemeComponents(),
      pluginRegistry: getPluginComponents(),
    });
    const app = await buildApp({ exporter, requestLogging: env.NODE_ENV !== 'test' });

    await app.listen({ port, host: '0.0.0.0' });
    logger.info(`Server started on port ${port}`);

    registerShutdownHandler(async () => {
      logger.info('Closing Fastify server (draining connections)...');
      await app.close();
      logger.info('Fastify server closed');
    });
  } catch (error) {
    logger.fatal('Failed to start server', toError(error));
    process.exit(1);
  }
}

void start();

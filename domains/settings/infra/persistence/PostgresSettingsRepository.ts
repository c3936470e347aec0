import type { Pool, PoolClient } from 'pg';

import { getLogger } from '@kernel/logger';
import type { SchemaInspector } from '@database/schema';

import type { SettingRow, SettingsRepository } from '../../application/ports/SettingsRepository';

const logger = getLogger('settings:repository');

export const SETTINGS_TABLE = 'tp_settings';

/**
* Repository implementation for tp_settings using PostgreSQL
*/
export class PostgresSettingsRepository implements SettingsRepository {
  constructor(
    private readonly pool: Pool,
    private readonly inspector: SchemaInspector
  ) {}

  private getQueryable(client?: PoolClient): Pool | PoolClient {
    return client || this.pool;
  }

  async tableExists(): Promise<boolean> {
    return this.inspector.hasTable(SETTINGS_TABLE);
  }

  async listAll(client?: PoolClient): Promise<SettingRow[]> {
    try {
      const { rows } = await this.getQueryable(client).query<SettingRow>(
        `SELECT key, value, autoload FROM ${SETTINGS_TABLE} ORDER BY key ASC`
      );
      return rows;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Failed to list settings', err);
      throw error;
    }
  }
}

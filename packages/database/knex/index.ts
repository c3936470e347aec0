import { knex, type Knex } from 'knex';
import { getLogger } from '@kernel/logger';

import { getConnectionString } from '../pool';

const logger = getLogger('database:knex');

let knexInstance: Knex | null = null;

/**
 * Lazy initialization of the Knex instance.
 * Only the schema builder is used (table and column introspection), so the
 * pool stays small.
 */
export function getKnex(): Knex {
  if (knexInstance) return knexInstance;

  knexInstance = knex({
    client: 'pg',
    connection: getConnectionString(),
    pool: {
      min: 0,
      max: 2,
      idleTimeoutMillis: 30000,
      acquireTimeoutMillis: 30000,
    },
  });

  return knexInstance;
}

/**
 * Destroy the Knex instance if it was created
 */
export async function closeKnex(): Promise<void> {
  const instance = knexInstance;
  knexInstance = null;
  if (instance) {
    await instance.destroy();
    logger.info('Knex instance destroyed');
  }
}

/**
 * Shared Database Package
 * Connection pool, Knex instance and schema introspection
 */

export * from './pool';
export * from './knex';
export * from './schema';

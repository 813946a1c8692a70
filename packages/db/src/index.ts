/**
 * @boardscout/db — drizzle schema, queries and the persistence gateway
 */

export { getDb, createDb, closeDb, type Db } from './client';
export * from './schema';
export * from './targets';
export * from './job-listings';
export * from './scrape-runs';
export * from './reports';
export * from './gateway';
export * from './memory-gateway';

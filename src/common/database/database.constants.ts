/**
 * Dependency injection tokens for database services
 * These tokens are used to inject the appropriate database implementation
 */

export const DATABASE_TOKENS = {
  STATISTICS_DATABASE: 'STATISTICS_DATABASE',
  COUCHDB_CONNECTION: 'COUCHDB_CONNECTION'
} as const;

export enum DatabaseType {
  MONGODB = 'mongodb',
  COUCHDB = 'couchdb'
}

export function isDatabaseType(value: string): value is DatabaseType {
  return value === DatabaseType.MONGODB || value === DatabaseType.COUCHDB;
}

export type { SqlClient, SqlPool, SqlPoolClient, SqlQueryResult } from './escrow-persistence.js';
export { PostgresEscrowPersistence } from './escrow-persistence.js';
export { SCHEMA_SQL } from './schema.js';

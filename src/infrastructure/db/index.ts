export { createDbClient } from './client.js';
export type { Database } from './client.js';
export {
  POSTGRES_TYPE,
  PostgresAdapter,
  buildInsert,
  classifyPostgresError,
  resolvePostgresConnection,
} from './postgres-adapter.js';

export { createDatabase } from './client.js';
export type {
  Database,
  DbTransaction,
  DbExecutor,
  DatabaseHandle,
  CreateDatabaseOptions,
} from './client.js';
export * as schema from './schema/index.js';
export type { WorkOrderRow, NewWorkOrderRow } from './schema/index.js';

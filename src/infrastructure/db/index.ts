export { records } from './schema.js';
export type { RecordRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, DbClientOptions } from './client.js';

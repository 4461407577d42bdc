export * from './schemas/index.js';
export * from './enums.js';
export { applySchema, schemaObjects } from './apply-schema.js';
export { createDb } from './client.js';
export type { Database, DbHandle, Schema } from './client.js';

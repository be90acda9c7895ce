export { entities, ENTITIES_DDL } from './schema.js';
export { createDbClient, prepareDatastore } from './client.js';
export type { Database, Sql } from './client.js';
export {
  fetchDueEntities,
  findEntityLeases,
  parseStoredLeases,
  registerEntity,
  createEntityStore,
} from './entity-repository.js';
export type { EntityRow } from './entity-repository.js';

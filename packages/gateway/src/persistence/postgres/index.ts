export type { Queryable } from './schema.js';
export { SCHEMA_SQL, ensureSchema } from './schema.js';
export { PostgresVoteStore } from './vote-store.js';
export { PostgresSubsidyStore } from './subsidy-store.js';

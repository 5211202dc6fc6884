/**
 * Store Adapters Module
 *
 * @module
 */

export type {
  EmbeddingProvider,
  IGraphStoreAdapter,
  IStoreAdapter,
  IVectorStoreAdapter,
  PrepareOptions,
} from "./interfaces/IStoreAdapter.js";
export { InMemoryGraphStore } from "./impl/InMemoryGraphStore.js";
export { InMemoryVectorStore, cosineSimilarity, type InMemoryVectorStoreOptions } from "./impl/InMemoryVectorStore.js";
export { PostgresGraphStore, type PostgresGraphStoreOptions } from "./impl/PostgresGraphStore.js";
export {
  createPool,
  runMigrations,
  mapPgError,
  DEFAULT_MIGRATIONS_DIR,
  type PgClientLike,
  type PgPoolLike,
} from "./impl/postgres.js";

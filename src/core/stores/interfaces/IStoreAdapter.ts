/**
 * Store Adapter Interfaces
 *
 * Both stores expose the same two-step write: `prepare*` stages work and
 * returns a token without making anything visible, then `commit` applies it
 * or `discard` drops it. Tokens are single-use.
 *
 * @module
 */

import type {
  EntityIdentifier,
  GraphNode,
  GraphOp,
  Properties,
  Relationship,
  StagingToken,
  StoreSide,
  VectorEntry,
  VectorSearchHit,
} from "../../../types/index.js";

export interface PrepareOptions {
  /** Fires when the caller's deadline passes; staging should stop early */
  signal?: AbortSignal;
}

/**
 * Lifecycle shared by every adapter
 */
export interface IStoreAdapter {
  readonly name: StoreSide;

  open(): Promise<void>;

  /**
   * Drops every staged token and releases connections
   */
  close(): Promise<void>;

  /**
   * Whether the store currently answers requests. Never throws.
   */
  ping(): Promise<boolean>;

  /**
   * Make staged work visible. Unknown or already used tokens are rejected.
   *
   * @throws StoreError for an unknown token
   * @throws TransientStoreError when the store cannot be reached
   */
  commit(token: StagingToken): Promise<void>;

  /**
   * Drop staged work. Discarding an unknown token is a no-op.
   */
  discard(token: StagingToken): Promise<void>;
}

export interface IGraphStoreAdapter extends IStoreAdapter {
  readonly name: "graph";

  /**
   * Stage node and relationship upserts. Relationship endpoints must exist
   * already or be staged in the same call.
   *
   * @throws ValidationError for malformed ops or missing endpoints
   * @throws TransientStoreError when the store cannot be reached
   */
  prepareWrite(ops: GraphOp[], options?: PrepareOptions): Promise<StagingToken>;

  getNode(id: EntityIdentifier): Promise<GraphNode | null>;

  /** Outgoing relationships of `sourceId` */
  getRelationships(sourceId: EntityIdentifier): Promise<Relationship[]>;
}

export interface IVectorStoreAdapter extends IStoreAdapter {
  readonly name: "vector";

  /**
   * Stage a full replacement of the entry for `id`
   *
   * @throws ValidationError for malformed input
   */
  prepareUpsert(
    id: EntityIdentifier,
    content: string,
    metadata: Properties,
    options?: PrepareOptions
  ): Promise<StagingToken>;

  get(id: EntityIdentifier): Promise<VectorEntry | null>;

  /**
   * Nearest committed entries by cosine similarity
   */
  search(queryVector: number[], limit: number): Promise<VectorSearchHit[]>;
}

/**
 * Turns text into an embedding vector
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

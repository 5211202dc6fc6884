/**
 * PostgreSQL graph store
 *
 * A prepared token is an open database transaction on a pooled client:
 * the upserts have run but nothing is visible to other sessions until
 * COMMIT. Discard rolls the transaction back. The client goes back to the
 * pool either way.
 */

import { z } from "zod";
import type { IGraphStoreAdapter, PrepareOptions } from "../interfaces/IStoreAdapter.js";
import {
  GraphOpSchema,
  PropertiesSchema,
  type EntityIdentifier,
  type GraphNode,
  type GraphOp,
  type Relationship,
  type StagingToken,
} from "../../../types/index.js";
import { fromZodError, StoreError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { assertOpen, assertTokenOwner, createStagingToken, orderGraphOps } from "./shared.js";
import { mapPgError, runMigrations, type PgClientLike, type PgPoolLike } from "./postgres.js";

const logger = createLogger("postgres-graph-store");

const GraphOpsSchema = z.array(GraphOpSchema);

const NodeRowSchema = z.object({
  id: z.string(),
  element_type: z.string(),
  content_hash: z.string(),
  properties: PropertiesSchema,
});

const EdgeRowSchema = z.object({
  source_id: z.string(),
  target_id: z.string(),
  rel_type: z.string(),
});

// Properties merge key by key; jsonb `||` keeps the right-hand value on conflict
const UPSERT_NODE_SQL = `
  INSERT INTO story_nodes (id, element_type, content_hash, properties)
  VALUES ($1, $2, $3, $4::jsonb)
  ON CONFLICT (id) DO UPDATE SET
    element_type = EXCLUDED.element_type,
    content_hash = EXCLUDED.content_hash,
    properties = story_nodes.properties || EXCLUDED.properties,
    updated_at = NOW()
`;

const UPSERT_EDGE_SQL = `
  INSERT INTO story_edges (source_id, target_id, rel_type)
  VALUES ($1, $2, $3)
  ON CONFLICT (source_id, target_id, rel_type) DO NOTHING
`;

export interface PostgresGraphStoreOptions {
  pool: PgPoolLike;
  /** Run pending migrations on open (default true) */
  migrate?: boolean;
  migrationsDir?: string;
}

export class PostgresGraphStore implements IGraphStoreAdapter {
  readonly name = "graph" as const;

  private readonly pool: PgPoolLike;
  private readonly migrate: boolean;
  private readonly migrationsDir?: string;
  private readonly staged = new Map<string, PgClientLike>();
  private closed = false;

  constructor(options: PostgresGraphStoreOptions) {
    this.pool = options.pool;
    this.migrate = options.migrate ?? true;
    this.migrationsDir = options.migrationsDir;
  }

  async open(): Promise<void> {
    if (this.migrate) {
      try {
        await runMigrations(this.pool, this.migrationsDir);
      } catch (error) {
        throw mapPgError(error, this.name, "Migration");
      }
    }
    this.closed = false;
    logger.debug("Postgres graph store opened");
  }

  async close(): Promise<void> {
    this.closed = true;
    const tokens = [...this.staged.keys()];
    for (const tokenId of tokens) {
      await this.discard({ adapter: this.name, id: tokenId });
    }
    await this.pool.end();
    logger.debug({ discarded: tokens.length }, "Postgres graph store closed");
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (error) {
      logger.debug({ err: error }, "Postgres ping failed");
      return false;
    }
  }

  async prepareWrite(ops: GraphOp[], options: PrepareOptions = {}): Promise<StagingToken> {
    assertOpen(this.closed, this.name);
    options.signal?.throwIfAborted();

    const parsed = GraphOpsSchema.safeParse(ops);
    if (!parsed.success) {
      throw fromZodError(parsed.error, "graphOps");
    }

    let client: PgClientLike;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw mapPgError(error, this.name, "Connect");
    }

    try {
      await client.query("BEGIN");
      for (const op of orderGraphOps(parsed.data)) {
        options.signal?.throwIfAborted();
        if (op.kind === "upsert_node") {
          const { id, elementType, contentHash, properties } = op.node;
          await client.query(UPSERT_NODE_SQL, [id, elementType, contentHash, JSON.stringify(properties)]);
        } else {
          const { sourceId, targetId, type } = op.relationship;
          await client.query(UPSERT_EDGE_SQL, [sourceId, targetId, type]);
        }
      }
    } catch (error) {
      await this.abandon(client, error);
      if (options.signal?.aborted && error === options.signal.reason) throw error;
      throw mapPgError(error, this.name, "Graph prepare");
    }

    const token = createStagingToken(this.name);
    this.staged.set(token.id, client);
    logger.debug({ tokenId: token.id, ops: parsed.data.length }, "Graph write staged");
    return token;
  }

  async commit(token: StagingToken): Promise<void> {
    assertTokenOwner(token, this.name);
    const client = this.staged.get(token.id);
    if (!client) {
      throw new StoreError(`Unknown staging token ${token.id}`, { adapter: this.name, tokenId: token.id });
    }

    this.staged.delete(token.id);
    try {
      await client.query("COMMIT");
      client.release();
    } catch (error) {
      // The session state is unknown; do not hand it back to the pool
      client.release(error instanceof Error ? error : true);
      throw mapPgError(error, this.name, "Graph commit");
    }
    logger.debug({ tokenId: token.id }, "Graph write committed");
  }

  async discard(token: StagingToken): Promise<void> {
    assertTokenOwner(token, this.name);
    const client = this.staged.get(token.id);
    if (!client) return;

    this.staged.delete(token.id);
    try {
      await client.query("ROLLBACK");
      client.release();
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw mapPgError(error, this.name, "Graph discard");
    }
    logger.debug({ tokenId: token.id }, "Graph write discarded");
  }

  async getNode(id: EntityIdentifier): Promise<GraphNode | null> {
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query(
        "SELECT id, element_type, content_hash, properties FROM story_nodes WHERE id = $1",
        [id]
      ));
    } catch (error) {
      throw mapPgError(error, this.name, "Node lookup");
    }

    const row = rows[0];
    if (row === undefined) return null;
    const node = NodeRowSchema.parse(row);
    return {
      id: node.id,
      elementType: node.element_type,
      contentHash: node.content_hash,
      properties: node.properties,
    };
  }

  async getRelationships(sourceId: EntityIdentifier): Promise<Relationship[]> {
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query(
        "SELECT source_id, target_id, rel_type FROM story_edges WHERE source_id = $1 ORDER BY created_at, target_id, rel_type",
        [sourceId]
      ));
    } catch (error) {
      throw mapPgError(error, this.name, "Relationship lookup");
    }

    return rows.map((row) => {
      const edge = EdgeRowSchema.parse(row);
      return { sourceId: edge.source_id, targetId: edge.target_id, type: edge.rel_type };
    });
  }

  get stagedCount(): number {
    return this.staged.size;
  }

  /**
   * Rolls back a half-staged transaction. A failed ROLLBACK destroys the
   * connection instead of returning it.
   */
  private async abandon(client: PgClientLike, cause: unknown): Promise<void> {
    try {
      await client.query("ROLLBACK");
      client.release();
    } catch (rollbackError) {
      logger.warn({ err: rollbackError, cause }, "Rollback of abandoned graph prepare failed");
      client.release(rollbackError instanceof Error ? rollbackError : true);
    }
  }
}

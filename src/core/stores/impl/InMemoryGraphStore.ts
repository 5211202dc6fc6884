/**
 * In-memory graph store
 *
 * Each token holds a validated change set; nothing is visible until commit,
 * which applies the whole set synchronously.
 */

import { z } from "zod";
import type { IGraphStoreAdapter, PrepareOptions } from "../interfaces/IStoreAdapter.js";
import {
  GraphNodeInputSchema,
  GraphOpSchema,
  type EntityIdentifier,
  type GraphNode,
  type GraphOp,
  type Relationship,
  type StagingToken,
} from "../../../types/index.js";
import { fromZodError, StoreError, ValidationError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import {
  assertOpen,
  assertTokenOwner,
  createStagingToken,
  orderGraphOps,
  relationshipKey,
} from "./shared.js";

const logger = createLogger("memory-graph-store");

const GraphOpsSchema = z.array(GraphOpSchema);

export class InMemoryGraphStore implements IGraphStoreAdapter {
  readonly name = "graph" as const;

  private readonly nodes = new Map<EntityIdentifier, GraphNode>();
  /** sourceId → (target, type) key → relationship, in insertion order */
  private readonly edges = new Map<EntityIdentifier, Map<string, Relationship>>();
  private readonly staged = new Map<string, GraphOp[]>();
  private closed = false;

  async open(): Promise<void> {
    this.closed = false;
  }

  async close(): Promise<void> {
    this.staged.clear();
    this.closed = true;
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  async prepareWrite(ops: GraphOp[], options: PrepareOptions = {}): Promise<StagingToken> {
    assertOpen(this.closed, this.name);
    options.signal?.throwIfAborted();

    const parsed = GraphOpsSchema.safeParse(ops);
    if (!parsed.success) {
      throw fromZodError(parsed.error, "graphOps");
    }

    const ordered = orderGraphOps(parsed.data);
    const stagedNodes = new Set<EntityIdentifier>();
    for (const op of ordered) {
      if (op.kind === "upsert_node") {
        stagedNodes.add(op.node.id);
        continue;
      }
      const { sourceId, targetId } = op.relationship;
      for (const endpoint of [sourceId, targetId]) {
        if (!this.nodes.has(endpoint) && !stagedNodes.has(endpoint)) {
          throw new ValidationError(`Relationship endpoint ${endpoint} does not exist`, {
            field: "relationship",
            entityId: endpoint,
          });
        }
      }
    }

    const token = createStagingToken(this.name);
    this.staged.set(token.id, structuredClone(ordered));
    logger.debug({ tokenId: token.id, ops: ordered.length }, "Graph write staged");
    return token;
  }

  async commit(token: StagingToken): Promise<void> {
    assertOpen(this.closed, this.name);
    assertTokenOwner(token, this.name);

    const ops = this.staged.get(token.id);
    if (!ops) {
      throw new StoreError(`Unknown staging token ${token.id}`, { adapter: this.name, tokenId: token.id });
    }

    this.staged.delete(token.id);
    for (const op of ops) {
      if (op.kind === "upsert_node") {
        this.applyNode(op.node);
      } else {
        this.applyRelationship(op.relationship);
      }
    }
    logger.debug({ tokenId: token.id, ops: ops.length }, "Graph write committed");
  }

  async discard(token: StagingToken): Promise<void> {
    assertTokenOwner(token, this.name);
    if (this.staged.delete(token.id)) {
      logger.debug({ tokenId: token.id }, "Graph write discarded");
    }
  }

  async getNode(id: EntityIdentifier): Promise<GraphNode | null> {
    const node = this.nodes.get(id);
    return node ? structuredClone(node) : null;
  }

  async getRelationships(sourceId: EntityIdentifier): Promise<Relationship[]> {
    return [...(this.edges.get(sourceId)?.values() ?? [])].map((rel) => ({ ...rel }));
  }

  /** Tokens prepared but neither committed nor discarded */
  get stagedCount(): number {
    return this.staged.size;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  private applyNode(input: z.infer<typeof GraphNodeInputSchema>): void {
    const existing = this.nodes.get(input.id);
    this.nodes.set(input.id, {
      id: input.id,
      elementType: input.elementType,
      contentHash: input.contentHash,
      properties: { ...existing?.properties, ...input.properties },
    });
  }

  private applyRelationship(relationship: Relationship): void {
    let outgoing = this.edges.get(relationship.sourceId);
    if (!outgoing) {
      outgoing = new Map();
      this.edges.set(relationship.sourceId, outgoing);
    }
    const key = relationshipKey(relationship.targetId, relationship.type);
    if (!outgoing.has(key)) {
      outgoing.set(key, { ...relationship });
    }
  }
}

/**
 * Unified Knowledge Base
 *
 * Resolves the element's identifier, then stages the vector upsert, the
 * node upsert and one edge upsert per distinct relationship in a single
 * coordinator transaction. Coordinator errors reach the caller unchanged.
 */

import { z } from "zod";
import {
  RelationshipInputSchema,
  RESERVED_PROPERTY_KEYS,
  type ConsistencyReport,
  type IKnowledgeBase,
  type RelationshipInput,
  type StoryElementSnapshot,
  type UpdateStoryElementOptions,
} from "../interfaces/IKnowledgeBase.js";
import type { IEntityRegistry } from "../../registry/interfaces/IEntityRegistry.js";
import type { IChangeLedger } from "../../ledger/interfaces/IChangeLedger.js";
import type { ChangeEvent } from "../../ledger/models/change-event.js";
import type { ITransactionCoordinator } from "../../transaction/interfaces/ITransactionCoordinator.js";
import type { TransactionHandle } from "../../transaction/models/transaction.js";
import type { IGraphStoreAdapter, IVectorStoreAdapter } from "../../stores/interfaces/IStoreAdapter.js";
import { fromZodError, ValidationError } from "../../errors.js";
import {
  PropertiesSchema,
  type EntityIdentifier,
  type Properties,
  type Relationship,
  type VectorSearchHit,
} from "../../../types/index.js";
import { calculateContentHash } from "../../../utils/hash.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("knowledge-base");

const RelationshipInputsSchema = z.array(RelationshipInputSchema);

export interface UnifiedKnowledgeBaseOptions {
  registry: IEntityRegistry;
  coordinator: ITransactionCoordinator;
  ledger: IChangeLedger;
  graph: IGraphStoreAdapter;
  vector: IVectorStoreAdapter;
}

export class UnifiedKnowledgeBase implements IKnowledgeBase {
  private readonly registry: IEntityRegistry;
  private readonly coordinator: ITransactionCoordinator;
  private readonly ledger: IChangeLedger;
  private readonly graph: IGraphStoreAdapter;
  private readonly vector: IVectorStoreAdapter;

  constructor(options: UnifiedKnowledgeBaseOptions) {
    this.registry = options.registry;
    this.coordinator = options.coordinator;
    this.ledger = options.ledger;
    this.graph = options.graph;
    this.vector = options.vector;
  }

  async updateStoryElement(
    elementType: string,
    content: string,
    relationships: RelationshipInput[] = [],
    options: UpdateStoryElementOptions = {}
  ): Promise<EntityIdentifier> {
    if (elementType.trim().length === 0) {
      throw new ValidationError("Element type must not be empty", { field: "elementType" });
    }
    if (content.trim().length === 0) {
      throw new ValidationError("Content must not be empty", { field: "content" });
    }
    const edges = parseRelationships(relationships);
    const metadata = parseMetadata(options.metadata);

    const contentHash = calculateContentHash(content);
    const entityId = await this.registry.resolveOrCreate(options.key ?? `${elementType}:${contentHash}`);

    const handle = await this.coordinator.begin(entityId, { lockPolicy: options.lockPolicy });
    await this.stage(handle, entityId, elementType, content, contentHash, metadata, edges);

    await this.coordinator.prepare(handle, { deadlineMs: options.prepareDeadlineMs });
    const receipt = await this.coordinator.commit(handle, { deadlineMs: options.commitDeadlineMs });

    logger.debug(
      { entityId, elementType, transactionId: receipt.transactionId, relationships: edges.length },
      "Story element updated"
    );
    return entityId;
  }

  async getStoryElement(entityId: EntityIdentifier): Promise<StoryElementSnapshot> {
    const [node, vector] = await Promise.all([this.graph.getNode(entityId), this.vector.get(entityId)]);
    return { entityId, node, vector };
  }

  async checkConsistency(entityId: EntityIdentifier): Promise<ConsistencyReport> {
    const { node, vector } = await this.getStoryElement(entityId);
    const graphHash = node?.contentHash;
    const vectorHash = vector ? calculateContentHash(vector.content) : undefined;

    if (!node && !vector) return { entityId, status: "absent" };
    if (!node) return { entityId, status: "graph_missing", vectorHash };
    if (!vector) return { entityId, status: "vector_missing", graphHash };
    return { entityId, status: graphHash === vectorHash ? "consistent" : "hash_mismatch", graphHash, vectorHash };
  }

  history(entityId: EntityIdentifier): ChangeEvent[] {
    return this.ledger.history(entityId);
  }

  relationshipsOf(entityId: EntityIdentifier): Promise<Relationship[]> {
    return this.graph.getRelationships(entityId);
  }

  searchSimilar(queryVector: number[], limit = 10): Promise<VectorSearchHit[]> {
    return this.vector.search(queryVector, limit);
  }

  /**
   * Stages every op, rolling the handle back if one is rejected so the
   * entity lock is released
   */
  private async stage(
    handle: TransactionHandle,
    entityId: EntityIdentifier,
    elementType: string,
    content: string,
    contentHash: string,
    metadata: Properties,
    edges: RelationshipInput[]
  ): Promise<void> {
    try {
      this.coordinator.stageVectorOp(handle, {
        id: entityId,
        content,
        metadata: { ...metadata, type: elementType, content_hash: contentHash },
      });
      this.coordinator.stageGraphOp(handle, {
        kind: "upsert_node",
        node: { id: entityId, elementType, contentHash, properties: { ...metadata, content_hash: contentHash } },
      });
      for (const edge of edges) {
        this.coordinator.stageGraphOp(handle, {
          kind: "upsert_relationship",
          relationship: { sourceId: entityId, targetId: edge.targetId, type: edge.type },
        });
      }
    } catch (error) {
      await this.coordinator.rollback(handle);
      throw error;
    }
  }
}

/**
 * Validates relationship inputs and drops repeated (target, type) pairs
 */
function parseRelationships(relationships: RelationshipInput[]): RelationshipInput[] {
  const parsed = RelationshipInputsSchema.safeParse(relationships);
  if (!parsed.success) {
    throw fromZodError(parsed.error, "relationships");
  }

  const seen = new Set<string>();
  const edges: RelationshipInput[] = [];
  for (const edge of parsed.data) {
    const key = `${edge.targetId}\u0000${edge.type}`;
    if (seen.has(key)) continue;
    seen.add(key);
    edges.push(edge);
  }
  return edges;
}

function parseMetadata(metadata: Properties | undefined): Properties {
  if (metadata === undefined) return {};
  const parsed = PropertiesSchema.safeParse(metadata);
  if (!parsed.success) {
    throw fromZodError(parsed.error, "metadata");
  }
  for (const key of RESERVED_PROPERTY_KEYS) {
    if (key in parsed.data) {
      throw new ValidationError(`Metadata key "${key}" is reserved`, { field: "metadata" });
    }
  }
  return parsed.data;
}

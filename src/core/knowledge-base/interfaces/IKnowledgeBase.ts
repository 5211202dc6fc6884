/**
 * Unified Knowledge Base Interface
 *
 * Single entry point for writing story elements to both stores.
 */

import { z } from "zod";
import type { ChangeEvent } from "../../ledger/models/change-event.js";
import type { LockPolicy } from "../../config.js";
import type {
  EntityIdentifier,
  GraphNode,
  Properties,
  Relationship,
  VectorEntry,
  VectorSearchHit,
} from "../../../types/index.js";

/**
 * Outgoing edge from the element being written
 */
export const RelationshipInputSchema = z.object({
  targetId: z.string().min(1),
  type: z.string().min(1),
});

export type RelationshipInput = z.infer<typeof RelationshipInputSchema>;

/** Property keys the knowledge base writes itself */
export const RESERVED_PROPERTY_KEYS = ["type", "content_hash"] as const;

export interface UpdateStoryElementOptions {
  /** Natural key; defaults to `<elementType>:<contentHash>` */
  key?: string;
  /** Scalar properties merged into the node and the vector metadata */
  metadata?: Properties;
  lockPolicy?: LockPolicy;
  prepareDeadlineMs?: number;
  commitDeadlineMs?: number;
}

export interface StoryElementSnapshot {
  entityId: EntityIdentifier;
  node: GraphNode | null;
  vector: VectorEntry | null;
}

export type ConsistencyStatus = "consistent" | "graph_missing" | "vector_missing" | "hash_mismatch" | "absent";

export interface ConsistencyReport {
  entityId: EntityIdentifier;
  status: ConsistencyStatus;
  /** `content_hash` recorded on the graph node */
  graphHash?: string;
  /** Hash of the content held by the vector store */
  vectorHash?: string;
}

export interface IKnowledgeBase {
  /**
   * Write one story element to both stores as a single transaction
   *
   * @returns the element's canonical identifier
   * @throws ValidationError for malformed input
   * @throws AbortedError if nothing was written
   * @throws ReconciliationRequiredError if one store holds the write
   */
  updateStoryElement(
    elementType: string,
    content: string,
    relationships?: RelationshipInput[],
    options?: UpdateStoryElementOptions
  ): Promise<EntityIdentifier>;

  getStoryElement(entityId: EntityIdentifier): Promise<StoryElementSnapshot>;

  checkConsistency(entityId: EntityIdentifier): Promise<ConsistencyReport>;

  history(entityId: EntityIdentifier): ChangeEvent[];

  relationshipsOf(entityId: EntityIdentifier): Promise<Relationship[]>;

  searchSimilar(queryVector: number[], limit?: number): Promise<VectorSearchHit[]>;
}

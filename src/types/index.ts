/**
 * Shared types for Storyweave
 *
 * Store-facing shapes are declared as zod schemas so that the same
 * definitions validate caller input and ledger records read back from disk.
 */

import { z } from "zod";

// =============================================================================
// Identity
// =============================================================================

/**
 * Canonical key correlating one logical entity across both stores
 */
export type EntityIdentifier = string;

/**
 * The two heterogeneous backing stores
 */
export const StoreSideSchema = z.enum(["graph", "vector"]);

export type StoreSide = z.infer<typeof StoreSideSchema>;

// =============================================================================
// Properties
// =============================================================================

export const PropertyValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type PropertyValue = z.infer<typeof PropertyValueSchema>;

export const PropertiesSchema = z.record(z.string(), PropertyValueSchema);

export type Properties = z.infer<typeof PropertiesSchema>;

// =============================================================================
// Graph
// =============================================================================

/**
 * Directed, typed edge. At most one edge exists per (source, target, type).
 */
export const RelationshipSchema = z.object({
  sourceId: z.string().min(1),
  targetId: z.string().min(1),
  type: z.string().min(1),
});

export type Relationship = z.infer<typeof RelationshipSchema>;

export const GraphNodeInputSchema = z.object({
  id: z.string().min(1),
  elementType: z.string().min(1),
  contentHash: z.string().min(1),
  properties: PropertiesSchema.default({}),
});

export type GraphNodeInput = z.input<typeof GraphNodeInputSchema>;

/**
 * Stored story element node.
 *
 * Merge rule on upsert: `elementType` and `contentHash` are replaced, each
 * key of `properties` is last-write-wins, keys the upsert omits survive.
 */
export interface GraphNode {
  id: EntityIdentifier;
  elementType: string;
  contentHash: string;
  properties: Properties;
}

export const GraphOpSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("upsert_node"), node: GraphNodeInputSchema }),
  z.object({ kind: z.literal("upsert_relationship"), relationship: RelationshipSchema }),
]);

export type GraphOp = z.infer<typeof GraphOpSchema>;

// =============================================================================
// Vector
// =============================================================================

export const VectorUpsertOpSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  metadata: PropertiesSchema.default({}),
});

export type VectorUpsertOp = z.infer<typeof VectorUpsertOpSchema>;

export interface VectorEntry {
  id: EntityIdentifier;
  content: string;
  metadata: Properties;
  embedding?: number[];
}

export interface VectorSearchHit {
  id: EntityIdentifier;
  /** Cosine similarity in [-1, 1], higher is closer */
  score: number;
  content: string;
  metadata: Properties;
}

// =============================================================================
// Staging
// =============================================================================

/**
 * Handle to work an adapter has staged but not made visible. Owned by
 * exactly one transaction until it is committed or discarded.
 */
export interface StagingToken {
  readonly adapter: StoreSide;
  readonly id: string;
}

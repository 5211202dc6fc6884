/**
 * Entity Registry Interface
 *
 * Append-only correlation table from natural keys to the canonical
 * identifier shared by the graph and vector stores.
 */

import { z } from "zod";
import type { EntityIdentifier } from "../../../types/index.js";

export const RegistryBindingSchema = z.object({
  naturalKey: z.string().min(1),
  entityId: z.string().min(1),
  createdAt: z.string().datetime(),
});

export type RegistryBinding = z.infer<typeof RegistryBindingSchema>;

/**
 * Persistence for registry bindings. Bindings are only ever appended.
 */
export interface IRegistryStorage {
  /** Every binding stored so far, in append order */
  load(): Promise<RegistryBinding[]>;
  append(binding: RegistryBinding): Promise<void>;
}

export interface IEntityRegistry {
  /**
   * Load persisted bindings. Must be called before any lookup.
   */
  initialize(): Promise<void>;

  /**
   * Return the identifier bound to `naturalKey`, minting and persisting one
   * on first use. Concurrent first calls for the same key all observe the
   * single identifier that was minted.
   */
  resolveOrCreate(naturalKey: string): Promise<EntityIdentifier>;

  /**
   * Identifier bound to `naturalKey`, or null
   */
  lookup(naturalKey: string): EntityIdentifier | null;

  /**
   * Whether `entityId` was ever minted by this registry
   */
  has(entityId: EntityIdentifier): boolean;

  size(): number;
}

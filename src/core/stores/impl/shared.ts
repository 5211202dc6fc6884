/**
 * Helpers shared by the shipped adapters
 */

import { randomUUID } from "node:crypto";
import type { GraphOp, StagingToken, StoreSide } from "../../../types/index.js";
import { StoreError } from "../../errors.js";

export function createStagingToken(adapter: StoreSide): StagingToken {
  return { adapter, id: `${adapter}_stg_${randomUUID()}` };
}

export function assertTokenOwner(token: StagingToken, adapter: StoreSide): void {
  if (token.adapter !== adapter) {
    throw new StoreError(`Token ${token.id} belongs to the ${token.adapter} store`, { adapter, tokenId: token.id });
  }
}

export function assertOpen(closed: boolean, adapter: StoreSide): void {
  if (closed) {
    throw new StoreError(`The ${adapter} store is closed`, { adapter });
  }
}

/**
 * Node upserts first, so relationships in the same batch can point at them
 */
export function orderGraphOps(ops: GraphOp[]): GraphOp[] {
  return [...ops.filter((op) => op.kind === "upsert_node"), ...ops.filter((op) => op.kind !== "upsert_node")];
}

export function relationshipKey(targetId: string, type: string): string {
  return `${targetId}\u0000${type}`;
}
